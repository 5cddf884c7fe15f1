/**
 * Key decoding for raw terminal input
 */

import type { KeyMsg } from './types.js';

type KeyModifiers = Partial<Pick<KeyMsg, 'ctrl' | 'alt' | 'shift' | 'meta'>>;

interface KeySpec extends KeyModifiers {
  key: string;
}

const ESCAPE_SEQUENCES: Record<string, KeySpec> = {
  '\x1b[A': { key: 'up' },
  '\x1b[B': { key: 'down' },
  '\x1b[C': { key: 'right' },
  '\x1b[D': { key: 'left' },
  '\x1bOA': { key: 'up' },
  '\x1bOB': { key: 'down' },
  '\x1bOC': { key: 'right' },
  '\x1bOD': { key: 'left' },
  '\x1b[H': { key: 'home' },
  '\x1b[1~': { key: 'home' },
  '\x1bOH': { key: 'home' },
  '\x1b[F': { key: 'end' },
  '\x1b[4~': { key: 'end' },
  '\x1bOF': { key: 'end' },
  '\x1b[2~': { key: 'insert' },
  '\x1b[3~': { key: 'delete' },
  '\x1b[5~': { key: 'pageup' },
  '\x1b[6~': { key: 'pagedown' },
  '\x1b[1;5A': { key: 'ctrl+up', ctrl: true },
  '\x1b[1;5B': { key: 'ctrl+down', ctrl: true },
  '\x1b[1;5C': { key: 'ctrl+right', ctrl: true },
  '\x1b[5C': { key: 'ctrl+right', ctrl: true },
  '\x1b[1;5D': { key: 'ctrl+left', ctrl: true },
  '\x1b[5D': { key: 'ctrl+left', ctrl: true },
  '\x1b[Z': { key: 'backtab', shift: true },
  '\x1b\x7f': { key: 'backspace', alt: true }
};

const CONTROL_KEYS: Record<number, KeySpec> = {
  9: { key: 'tab' },
  10: { key: 'enter' },
  13: { key: 'enter' },
  8: { key: 'backspace' },
  127: { key: 'backspace' }
};

function keyMsg(spec: KeySpec, sequence: string): KeyMsg {
  return {
    type: 'key',
    key: spec.key,
    ctrl: spec.ctrl ?? false,
    alt: spec.alt ?? false,
    shift: spec.shift ?? false,
    meta: spec.meta ?? false,
    sequence
  };
}

function decodeControl(char: string): KeyMsg | null {
  const code = char.charCodeAt(0);
  const named = CONTROL_KEYS[code];
  if (named) {
    return keyMsg(named, char);
  }

  // Ctrl+A .. Ctrl+Z
  if (code >= 1 && code <= 26) {
    return keyMsg({ key: String.fromCharCode(code + 96), ctrl: true }, char);
  }

  return null;
}

// Longest match first
const SEQUENCES_BY_LENGTH = Object.keys(ESCAPE_SEQUENCES).sort((a, b) => b.length - a.length);

// CSI: ESC [ parameters, intermediates, one final byte
const CSI_PATTERN = /^\x1b\[[0-?]*[ -/]*[@-~]/;

interface Decoded {
  msg: KeyMsg | null;
  length: number;
}

function decodeEscapeAt(data: string, start: number): Decoded {
  for (const sequence of SEQUENCES_BY_LENGTH) {
    if (data.startsWith(sequence, start)) {
      return { msg: keyMsg(ESCAPE_SEQUENCES[sequence], sequence), length: sequence.length };
    }
  }

  // Unknown CSI sequences are skipped whole
  const csi = CSI_PATTERN.exec(data.slice(start));
  if (csi) {
    return { msg: null, length: csi[0].length };
  }

  // Alt + key (ESC + char)
  const next = data.codePointAt(start + 1);
  if (next !== undefined && next >= 0x20 && next !== 0x7f) {
    const sequence = '\x1b' + String.fromCodePoint(next);
    return { msg: keyMsg({ key: sequence.slice(1), alt: true }, sequence), length: sequence.length };
  }

  return { msg: keyMsg({ key: 'escape' }, '\x1b'), length: 1 };
}

/**
 * Decode one chunk read from the input stream. Several escape sequences may
 * arrive together; plain text yields one key per character.
 */
export function decodeKeys(data: string): KeyMsg[] {
  const keys: KeyMsg[] = [];
  let index = 0;

  while (index < data.length) {
    if (data[index] === '\x1b') {
      const { msg, length } = decodeEscapeAt(data, index);
      if (msg) keys.push(msg);
      index += length;
      continue;
    }

    const char = String.fromCodePoint(data.codePointAt(index) ?? 0);
    index += char.length;

    const code = char.charCodeAt(0);
    if (code < 32 || code === 127) {
      const msg = decodeControl(char);
      if (msg) keys.push(msg);
      continue;
    }
    keys.push(keyMsg({ key: char }, char));
  }
  return keys;
}
