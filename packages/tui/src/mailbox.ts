/**
 * Mailbox - unbounded async FIFO
 *
 * Carries the message stream, the error stream and buffered keys. Posting
 * never blocks; once closed, posts are dropped and receivers are released.
 */

interface Readiness {
  promise: Promise<void>;
  resolve: () => void;
}

function createReadiness(): Readiness {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

export class MailboxClosedError extends Error {
  constructor(message = 'mailbox closed') {
    super(message);
    this.name = 'MailboxClosedError';
  }
}

export class Mailbox<T> {
  private items: T[] = [];
  private readiness: Readiness | null = null;
  private closed = false;
  private closeReason: unknown = null;

  get pending(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Append an item. Returns false when the mailbox is closed and the item
   * was dropped.
   */
  post(item: T): boolean {
    if (this.closed) {
      return false;
    }
    this.items.push(item);
    this.wake();
    return true;
  }

  /**
   * Remove the oldest item. Callers check `pending` first.
   */
  take(): T {
    if (this.items.length === 0) {
      throw new Error('take() on an empty mailbox');
    }
    const [item] = this.items.splice(0, 1);
    return item;
  }

  /**
   * Resolves once an item is pending, the mailbox is closed or `notify()` is
   * called. Does not consume anything.
   */
  ready(): Promise<void> {
    if (this.items.length > 0 || this.closed) {
      return Promise.resolve();
    }
    if (!this.readiness) {
      this.readiness = createReadiness();
    }
    return this.readiness.promise;
  }

  /**
   * Wait for and remove the next item. Rejects with the close reason once
   * the mailbox is closed and drained, or with the abort reason.
   */
  async receive(signal?: AbortSignal): Promise<T> {
    for (;;) {
      signal?.throwIfAborted();
      if (this.items.length > 0) {
        return this.take();
      }
      if (this.closed) {
        throw this.closeReason;
      }
      await (signal ? whenReadyOrAborted(this.ready(), signal) : this.ready());
    }
  }

  /**
   * Release current `ready()` waiters without posting an item. Lets another
   * stream share this mailbox's wake-up instead of being raced against it.
   */
  notify(): void {
    this.wake();
  }

  /**
   * Stop accepting items and release every waiter. Items already queued
   * remain receivable.
   */
  close(reason: unknown = new MailboxClosedError()): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.closeReason = reason;
    this.wake();
  }

  private wake(): void {
    const readiness = this.readiness;
    this.readiness = null;
    readiness?.resolve();
  }
}

function whenReadyOrAborted(ready: Promise<void>, signal: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const onAbort = (): void => {
      reject(signal.reason);
    };
    signal.addEventListener('abort', onAbort, { once: true });
    ready.then(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, reject);
  });
}
