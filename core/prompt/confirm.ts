/**
 * Yes/no confirmation used before destructive commands.
 *
 * The editor core only needs the outcome; drawing the question and
 * reading the answer belong to the host UI.
 */

export interface ConfirmationPrompt {
  /** Ask a yes/no question. true means the user accepted. */
  confirm(question: string): boolean;
}

/** Used when no UI is attached: every destructive action is declined. */
export const declineAll: ConfirmationPrompt = {
  confirm: () => false,
};

/** Adapt a plain callback to the prompt interface. */
export function promptFrom(callback: (question: string) => boolean): ConfirmationPrompt {
  return { confirm: callback };
}
