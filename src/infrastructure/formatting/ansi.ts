/**
 * @lumberline/core - ANSI helpers
 */

const ESC = '\x1b';

/**
 * Remove ANSI escape sequences.
 *
 * An escape runs from ESC up to and including the next `m`, which covers
 * the SGR colour codes the text formatter emits.
 */
export function stripAnsi(text: string): string {
  if (!text.includes(ESC)) {
    return text;
  }

  let out = '';
  let inEscape = false;
  for (const ch of text) {
    if (ch === ESC) {
      inEscape = true;
    } else if (inEscape) {
      if (ch === 'm') inEscape = false;
    } else {
      out += ch;
    }
  }
  return out;
}
