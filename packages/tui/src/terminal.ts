/**
 * Terminal session: raw mode, key input and output primitives
 */

import type { Readable, Writable } from 'node:stream';
import ansiEscapes from 'ansi-escapes';
import { InputClosedError, TerminalSetupError } from './errors.js';
import { decodeKeys } from './keys.js';
import { Mailbox } from './mailbox.js';
import type { KeyMsg } from './types.js';

/**
 * Everything the program loop needs from a terminal. One session belongs to
 * one program; `restore` undoes `enterRawMode`.
 */
export interface TerminalSession {
  /**
   * Enter raw mode. Throws when the terminal cannot be set up.
   */
  enterRawMode(): void;
  restore(): void;
  /**
   * Next decoded key. Rejects on read failure or when the signal aborts.
   */
  readKey(signal: AbortSignal): Promise<KeyMsg>;
  /**
   * Clear the current line and the `count` lines above it.
   */
  clearLines(count: number): Promise<void>;
  write(text: string): Promise<void>;
  enterAltScreen(): Promise<void>;
  exitAltScreen(): Promise<void>;
  /**
   * Output width in cells, when known
   */
  readonly columns: number | undefined;
}

/**
 * Buffers decoded keys from a readable stream
 */
export class KeyReader {
  private keys = new Mailbox<KeyMsg>();
  private attached = false;

  constructor(private readonly input: Readable) {}

  attach(): void {
    if (this.attached) return;

    this.input.setEncoding('utf8');
    this.input.on('data', this.handleData);
    this.input.on('error', this.handleError);
    this.input.on('end', this.handleEnd);
    this.input.resume();
    this.attached = true;
  }

  detach(): void {
    if (!this.attached) return;

    this.input.removeListener('data', this.handleData);
    this.input.removeListener('error', this.handleError);
    this.input.removeListener('end', this.handleEnd);
    this.input.pause();
    this.attached = false;
  }

  next(signal: AbortSignal): Promise<KeyMsg> {
    return this.keys.receive(signal);
  }

  private handleData = (chunk: string | Buffer): void => {
    const data = typeof chunk === 'string' ? chunk : chunk.toString('utf8');
    for (const key of decodeKeys(data)) {
      this.keys.post(key);
    }
  };

  private handleError = (error: Error): void => {
    this.keys.close(error);
  };

  private handleEnd = (): void => {
    this.keys.close(new InputClosedError());
  };
}

/**
 * The parts of `process.stdin` a session uses
 */
export type TerminalInput = Readable & {
  isTTY?: boolean;
  setRawMode?(mode: boolean): unknown;
};

/**
 * The parts of `process.stdout` a session uses
 */
export type TerminalOutput = Writable & {
  isTTY?: boolean;
  columns?: number;
};

/**
 * Terminal session on Node streams (stdin/stdout by default)
 */
export class NodeTerminal implements TerminalSession {
  private reader: KeyReader;
  private rawMode = false;

  constructor(
    private readonly input: TerminalInput = process.stdin,
    private readonly output: TerminalOutput = process.stdout
  ) {
    this.reader = new KeyReader(input);
  }

  get columns(): number | undefined {
    return this.output.isTTY ? this.output.columns : undefined;
  }

  enterRawMode(): void {
    if (this.input.isTTY && this.input.setRawMode) {
      try {
        this.input.setRawMode(true);
      } catch (error) {
        throw new TerminalSetupError(undefined, { cause: error });
      }
      this.rawMode = true;
    }

    this.reader.attach();
    this.output.write(ansiEscapes.cursorHide);
  }

  restore(): void {
    this.reader.detach();

    if (this.rawMode) {
      this.input.setRawMode?.(false);
      this.rawMode = false;
    }

    this.output.write(ansiEscapes.cursorShow);
  }

  readKey(signal: AbortSignal): Promise<KeyMsg> {
    return this.reader.next(signal);
  }

  clearLines(count: number): Promise<void> {
    return this.write(ansiEscapes.eraseLines(count + 1));
  }

  write(text: string): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      this.output.write(text, (error) => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
    });
  }

  enterAltScreen(): Promise<void> {
    return this.write(ansiEscapes.enterAlternativeScreen);
  }

  exitAltScreen(): Promise<void> {
    return this.write(ansiEscapes.exitAlternativeScreen);
  }
}
