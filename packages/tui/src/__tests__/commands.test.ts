/**
 * Command Helper Tests
 */

import { afterEach, describe, it, expect, vi } from 'vitest';
import { batch, map, quit, retry, tick } from '../commands.js';
import { classify, isBatchMsg, isQuitMsg } from '../signals.js';
import type { Cmd, Message } from '../types.js';

async function resultOf<Msg>(cmd: Cmd<Msg> | null, signal = new AbortController().signal): Promise<Message<Msg> | null> {
  if (!cmd) {
    throw new Error('expected a command');
  }
  return (await cmd(signal)) ?? null;
}

describe('batch', () => {
  it('is the no-op command when given nothing to run', () => {
    expect(batch()).toBeNull();
    expect(batch<string>(null, undefined)).toBeNull();
  });

  it('produces a batch message carrying the present commands', async () => {
    const a: Cmd<string> = () => 'a';
    const b: Cmd<string> = () => 'b';

    const msg = await resultOf(batch(a, null, b));

    expect(msg).not.toBeNull();
    if (msg === null) return;
    expect(isBatchMsg(msg)).toBe(true);
    expect(classify(msg)).toEqual({ kind: 'batch', cmds: [a, b] });
  });
});

describe('quit', () => {
  it('returns the shared quit sentinel', () => {
    expect(quit()).toBe(quit());
    expect(isQuitMsg(quit())).toBe(true);
    expect(classify<string>(quit())).toEqual({ kind: 'quit' });
  });

  it('does not mistake application messages for signals', () => {
    expect(classify<unknown>({ type: 'quit' })).toEqual({ kind: 'app', msg: { type: 'quit' } });
    expect(classify('hello')).toEqual({ kind: 'app', msg: 'hello' });
  });
});

describe('tick', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('produces a message from the time once the delay has passed', async () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-01-01T00:00:00Z'));

    const pending = resultOf(tick<number>(1000, (time) => time.getTime()));
    await vi.advanceTimersByTimeAsync(1000);

    await expect(pending).resolves.toBe(new Date('2026-01-01T00:00:01Z').getTime());
  });

  it('produces nothing and clears its timer when cancelled', async () => {
    vi.useFakeTimers();
    const controller = new AbortController();

    const pending = resultOf(tick<string>(1000, () => 'fired'), controller.signal);
    controller.abort();

    await expect(pending).resolves.toBeNull();
    expect(vi.getTimerCount()).toBe(0);
  });
});

describe('map', () => {
  const double = (n: number): number => n * 2;

  it('transforms application results', async () => {
    expect(await resultOf(map(() => 21, double))).toBe(42);
    expect(await resultOf(map<number, number>(() => null, double))).toBeNull();
  });

  it('passes quit through unchanged', async () => {
    expect(await resultOf(map<number, number>(quit, double))).toBe(quit());
  });

  it('maps the commands inside a batch', async () => {
    const inner = batch<number>(() => 1, () => 2);
    if (!inner) throw new Error('expected a batch');

    const msg = await resultOf(map(inner, double));
    if (msg === null) throw new Error('expected a batch message');

    const signal = classify(msg);
    if (signal.kind !== 'batch') throw new Error('expected a batch message');

    const results = await Promise.all(signal.cmds.map((cmd) => resultOf(cmd)));
    expect(results).toEqual([2, 4]);
  });
});

describe('retry', () => {
  it('reruns a failing command until it succeeds', async () => {
    let attempts = 0;
    const flaky: Cmd<string> = () => {
      attempts += 1;
      if (attempts < 3) throw new Error('not yet');
      return 'ok';
    };

    expect(await resultOf(retry(flaky, { delayMs: 0 }))).toBe('ok');
    expect(attempts).toBe(3);
  });

  it('rethrows the last failure when attempts run out', async () => {
    const failure = new Error('still failing');
    const failing: Cmd<string> = () => {
      throw failure;
    };

    await expect(resultOf(retry(failing, { maxAttempts: 2, delayMs: 0 }))).rejects.toBe(failure);
  });

  it('lets onError turn a failure into a message', async () => {
    const failing: Cmd<string> = () => {
      throw new Error('nope');
    };

    const cmd = retry(failing, { onError: (_error, attempt) => `failed on attempt ${attempt}` });

    expect(await resultOf(cmd)).toBe('failed on attempt 1');
  });

  it('gives up quietly once cancelled', async () => {
    const controller = new AbortController();
    let attempts = 0;
    const failing: Cmd<string> = () => {
      attempts += 1;
      throw new Error('nope');
    };
    controller.abort();

    expect(await resultOf(retry(failing, { delayMs: 1000 }), controller.signal)).toBeNull();
    expect(attempts).toBe(1);
  });
});
