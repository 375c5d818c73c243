/**
 * Small leveled logger. Debug output only appears in verbose mode; every
 * line goes to a sink so hosts can route it (console by default, an array
 * in tests).
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogSink = (level: LogLevel, message: string) => void;

export interface LoggerOptions {
  verbose?: boolean;
  sink?: LogSink;
}

const consoleSink: LogSink = (level, message) => {
  // Keep stdout free for the host; diagnostics go to stderr
  if (level === 'info') console.log(message);
  else console.error(message);
};

export class Logger {
  private verbose: boolean;
  private sink: LogSink;

  constructor(opts: LoggerOptions = {}) {
    this.verbose = !!opts.verbose;
    this.sink = opts.sink ?? consoleSink;
  }

  setVerbose(verbose: boolean): void {
    this.verbose = verbose;
  }

  debug(message: string): void {
    if (!this.verbose) return;
    this.sink('debug', message);
  }

  info(message: string): void {
    this.sink('info', message);
  }

  warn(message: string): void {
    this.sink('warn', message);
  }

  error(message: string): void {
    this.sink('error', message);
  }
}
