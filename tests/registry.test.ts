import { describe, expect, test } from 'vitest';
import { Arena, sameHandle } from '../core/registry/arena';
import { BufferRegistry } from '../core/document/buffer-registry';
import { DuplicateBufferError } from '../core/errors';

describe('Arena', () => {
  test('removed handles stay dead after slot reuse', () => {
    const arena = new Arena<string>();
    const a = arena.insert('a');
    const b = arena.insert('b');
    expect(arena.remove(a)).toBe('a');
    expect(arena.get(a)).toBeNull();

    const c = arena.insert('c');
    expect(c.index).toBe(a.index);
    expect(c.generation).toBe(1);
    expect(arena.get(a)).toBeNull();
    expect(arena.get(c)).toBe('c');
    expect(arena.get(b)).toBe('b');
  });

  test('values keep insertion order', () => {
    const arena = new Arena<string>();
    const a = arena.insert('a');
    arena.insert('b');
    arena.remove(a);
    arena.insert('c');
    expect(arena.values()).toEqual(['b', 'c']);
    expect(arena.size).toBe(2);
  });

  test('remove of a stale handle is a no-op', () => {
    const arena = new Arena<string>();
    const a = arena.insert('a');
    arena.remove(a);
    expect(arena.remove(a)).toBeNull();
    expect(arena.size).toBe(0);
  });

  test('sameHandle compares slot and generation', () => {
    const arena = new Arena<string>();
    const a = arena.insert('a');
    expect(sameHandle(a, arena.handleOf('a'))).toBe(true);
    arena.remove(a);
    const b = arena.insert('b');
    expect(sameHandle(a, b)).toBe(false);
    expect(sameHandle(null, null)).toBe(true);
    expect(sameHandle(a, null)).toBe(false);
  });
});

describe('BufferRegistry', () => {
  test('lists documents in creation order', () => {
    const reg = new BufferRegistry();
    reg.create('b');
    reg.create('a');
    reg.create('c');
    expect(reg.list().map(d => d.name)).toEqual(['b', 'a', 'c']);
    expect(reg.count).toBe(3);
  });

  test('names are unique', () => {
    const reg = new BufferRegistry();
    reg.create('notes');
    expect(() => reg.create('notes')).toThrow(DuplicateBufferError);
  });

  test('handles of removed documents resolve to null', () => {
    const reg = new BufferRegistry();
    const doc = reg.create('notes');
    const handle = reg.handleOf(doc);
    expect(reg.resolve(handle)).toBe(doc);

    expect(reg.remove(doc)).toBe(true);
    expect(reg.count).toBe(0);
    expect(reg.resolve(handle)).toBeNull();
    expect(reg.findByName('notes')).toBeNull();
    expect(reg.isLive(doc)).toBe(false);
    expect(reg.remove(doc)).toBe(false);
  });

  test('a new document with a reused name gets a fresh handle', () => {
    const reg = new BufferRegistry();
    const first = reg.create('notes');
    const handle = reg.handleOf(first);
    reg.remove(first);
    const second = reg.create('notes');
    expect(reg.resolve(handle)).toBeNull();
    expect(reg.findByName('notes')).toBe(second);
  });
});
