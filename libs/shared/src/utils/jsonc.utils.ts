/**
 * Remove `//` line comments and `/* *\/` block comments that sit outside
 * string literals. Newlines inside block comments are kept so parse errors
 * still point at the right line.
 */
export function stripJsonComments(text: string): string {
  let out = '';
  let inString = false;
  let i = 0;

  while (i < text.length) {
    const ch = text.charAt(i);
    const next = text.charAt(i + 1);

    if (inString) {
      if (ch === '\\') {
        out += ch + next;
        i += 2;
        continue;
      }
      if (ch === '"') inString = false;
      out += ch;
      i++;
      continue;
    }

    if (ch === '"') {
      inString = true;
      out += ch;
      i++;
      continue;
    }

    if (ch === '/' && next === '/') {
      while (i < text.length && text.charAt(i) !== '\n') i++;
      continue;
    }

    if (ch === '/' && next === '*') {
      i += 2;
      while (i < text.length && !(text.charAt(i) === '*' && text.charAt(i + 1) === '/')) {
        if (text.charAt(i) === '\n') out += '\n';
        i++;
      }
      i += 2;
      continue;
    }

    out += ch;
    i++;
  }

  return out;
}

/**
 * Parse a JSON-with-comments document. Throws SyntaxError when the text
 * left after stripping comments is not valid JSON.
 */
export function parseJsonc(text: string): unknown {
  return JSON.parse(stripJsonComments(text));
}
