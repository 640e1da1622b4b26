/**
 * checkdesk TUI — Raw stdin keystroke decoding.
 */

export type KeyName =
  | 'ctrl-c' | 'ctrl-d' | 'enter' | 'tab' | 'escape'
  | 'up' | 'down' | 'left' | 'right' | 'home' | 'end'
  | 'delete' | 'backspace'
  | 'ctrl-a' | 'ctrl-e' | 'ctrl-k' | 'ctrl-u' | 'ctrl-w';

export type Key =
  | { name: KeyName }
  | { name: 'text'; text: string }
  | { name: 'unknown' };

const CONTROL: Record<number, KeyName> = {
  1: 'ctrl-a',
  3: 'ctrl-c',
  4: 'ctrl-d',
  5: 'ctrl-e',
  8: 'backspace',
  9: 'tab',
  10: 'enter',
  11: 'ctrl-k',
  13: 'enter',
  21: 'ctrl-u',
  23: 'ctrl-w',
  127: 'backspace',
};

/** CSI final bytes (ESC [ x) */
const CSI: Record<number, KeyName> = {
  65: 'up',
  66: 'down',
  67: 'right',
  68: 'left',
  70: 'end',
  72: 'home',
};

export function decodeKey(data: Buffer): Key {
  const code = data[0];
  if (code === undefined) return { name: 'unknown' };

  if (code === 27) {
    if (data.length === 1) return { name: 'escape' };
    if (data[1] === 91) {
      const final = data[2];
      if (final === undefined) return { name: 'unknown' };
      // ESC[3~ delete, ESC[1~ home, ESC[4~ end
      if (data[3] === 126) {
        if (final === 51) return { name: 'delete' };
        if (final === 49) return { name: 'home' };
        if (final === 52) return { name: 'end' };
        return { name: 'unknown' };
      }
      const name = CSI[final];
      return name ? { name } : { name: 'unknown' };
    }
    return { name: 'unknown' };
  }

  const control = CONTROL[code];
  if (control) return { name: control };

  if (code >= 32 || (data.length > 1 && code > 127)) {
    // Drop embedded newlines from pasted text
    const text = data.toString('utf-8').replace(/[\r\n]+/g, ' ');
    return { name: 'text', text };
  }
  return { name: 'unknown' };
}
