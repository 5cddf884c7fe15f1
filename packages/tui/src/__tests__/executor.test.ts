/**
 * Command Executor and Batch Expander Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { expandBatch } from '../batch.js';
import { CommandError } from '../errors.js';
import { CommandExecutor } from '../executor.js';
import type { Cmd, Message } from '../types.js';

function setup() {
  const controller = new AbortController();
  const messages: Array<Message<string>> = [];
  const errors: unknown[] = [];
  const executor = new CommandExecutor<string>(
    {
      message: (msg) => {
        messages.push(msg);
      },
      error: (error) => {
        errors.push(error);
      }
    },
    controller.signal
  );
  return { controller, messages, errors, executor };
}

const settle = (): Promise<void> => new Promise((resolve) => setTimeout(resolve, 0));

describe('CommandExecutor', () => {
  it('never schedules absent commands', async () => {
    const { executor, messages } = setup();

    expect(executor.dispatch(null)).toBe(false);
    expect(executor.dispatch(undefined)).toBe(false);
    expect(executor.active).toBe(0);

    await settle();
    expect(messages).toEqual([]);
  });

  it('runs a command off the caller stack and delivers its result once', async () => {
    const { executor, messages } = setup();
    let ran = false;

    expect(
      executor.dispatch(() => {
        ran = true;
        return 'done';
      })
    ).toBe(true);
    expect(ran).toBe(false);
    expect(executor.active).toBe(1);

    await vi.waitFor(() => expect(messages).toEqual(['done']));
    expect(executor.active).toBe(0);
  });

  it('delivers nothing for a command without a result', async () => {
    const { executor, messages } = setup();

    executor.dispatch(() => null);
    executor.dispatch(async () => undefined);

    await vi.waitFor(() => expect(executor.active).toBe(0));
    expect(messages).toEqual([]);
  });

  it('hands the program signal to commands', async () => {
    const { executor, controller } = setup();
    const seen: AbortSignal[] = [];

    executor.dispatch((signal) => {
      seen.push(signal);
      return null;
    });

    await vi.waitFor(() => expect(seen).toEqual([controller.signal]));
  });

  it('reports a throwing command as a CommandError', async () => {
    const { executor, errors, messages } = setup();
    const failure = new Error('boom');

    executor.dispatch(async () => {
      throw failure;
    });

    await vi.waitFor(() => expect(errors).toHaveLength(1));
    const [error] = errors;
    expect(error).toBeInstanceOf(CommandError);
    expect(error).toMatchObject({ message: 'command failed: boom' });
    expect(error).toHaveProperty('cause', failure);
    expect(messages).toEqual([]);
  });

  it('drops results that arrive after termination', async () => {
    const { executor, controller, messages } = setup();
    let finish: (value: string) => void = () => {};
    let started = false;

    executor.dispatch(
      () =>
        new Promise<string>((resolve) => {
          started = true;
          finish = resolve;
        })
    );
    await vi.waitFor(() => expect(started).toBe(true));

    controller.abort();
    finish('late');

    await vi.waitFor(() => expect(executor.active).toBe(0));
    expect(messages).toEqual([]);
  });

  it('drops failures that arrive after termination', async () => {
    const { executor, controller, errors } = setup();
    let fail: (error: Error) => void = () => {};

    executor.dispatch(
      () =>
        new Promise<string>((_resolve, reject) => {
          fail = reject;
        })
    );
    await settle();

    controller.abort();
    fail(new Error('too late'));

    await vi.waitFor(() => expect(executor.active).toBe(0));
    expect(errors).toEqual([]);
  });

  it('refuses submissions after termination', () => {
    const { executor, controller } = setup();
    controller.abort();

    expect(executor.dispatch(() => 'ignored')).toBe(false);
    expect(executor.active).toBe(0);
  });
});

describe('expandBatch', () => {
  it('schedules every command once, in list order', async () => {
    const { executor, messages } = setup();
    const order: string[] = [];
    const cmds: Array<Cmd<string>> = ['a', 'b', 'c'].map((name) => () => {
      order.push(name);
      return name;
    });

    expect(expandBatch(cmds, executor)).toBe(3);

    await vi.waitFor(() => expect(messages).toHaveLength(3));
    expect(order).toEqual(['a', 'b', 'c']);
    expect([...messages].sort()).toEqual(['a', 'b', 'c']);
  });

  it('delivers the results of concurrent commands whatever their completion order', async () => {
    const { executor, messages } = setup();
    const later = (name: string, ms: number): Cmd<string> => () =>
      new Promise<string>((resolve) => setTimeout(() => resolve(name), ms));

    expandBatch([later('slow', 30), later('fast', 0), () => null, later('mid', 10)], executor);

    await vi.waitFor(() => expect(executor.active).toBe(0));
    expect(messages).toEqual(['fast', 'mid', 'slow']);
  });

  it('schedules nothing after termination', () => {
    const { executor, controller } = setup();
    controller.abort();

    expect(expandBatch([() => 'a', () => 'b'], executor)).toBe(0);
  });
});
