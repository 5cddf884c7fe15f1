/**
 * Input Feeder Tests
 */

import { describe, it, expect } from 'vitest';
import { feedInput } from '../input.js';
import type { KeyMsg } from '../types.js';
import { FakeTerminal } from './helpers/fake-terminal.js';

function collect() {
  const keys: string[] = [];
  const errors: unknown[] = [];
  return {
    keys,
    errors,
    sink: {
      message: (msg: KeyMsg) => {
        keys.push(msg.key);
      },
      error: (error: unknown) => {
        errors.push(error);
      }
    }
  };
}

describe('feedInput', () => {
  it('forwards keys in the order they are read', async () => {
    const terminal = new FakeTerminal();
    const controller = new AbortController();
    const { keys, errors, sink } = collect();
    terminal.press('a', '\x1b[A', 'b');

    await feedInput(
      terminal,
      {
        message: (msg) => {
          sink.message(msg);
          if (keys.length === 3) controller.abort();
        },
        error: sink.error
      },
      controller.signal
    );

    expect(keys).toEqual(['a', 'up', 'b']);
    expect(errors).toEqual([]);
  });

  it('reports the first read failure as-is and stops', async () => {
    const terminal = new FakeTerminal();
    const failure = new Error('read failed');
    const { keys, errors, sink } = collect();
    terminal.press('x');
    terminal.failInput(failure);

    await feedInput(terminal, sink, new AbortController().signal);

    expect(keys).toEqual(['x']);
    expect(errors).toHaveLength(1);
    expect(errors[0]).toBe(failure);
  });

  it('stops quietly when cancelled while waiting for a key', async () => {
    const terminal = new FakeTerminal();
    const controller = new AbortController();
    const { keys, errors, sink } = collect();

    const feeding = feedInput(terminal, sink, controller.signal);
    controller.abort();
    await feeding;

    expect(keys).toEqual([]);
    expect(errors).toEqual([]);
  });
});
