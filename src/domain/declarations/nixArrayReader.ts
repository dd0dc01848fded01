import { ConfigReadError } from './errors.js';

/**
 * Reads the list of values declared under a key of a configuration file.
 * Throws when the key or its list cannot be found.
 */
export type ConfigurationReader = (content: string, key: string) => string[];

const OPENERS: Record<string, string> = { '[': ']', '{': '}', '(': ')' };

function skipDoubleQuoted(text: string, start: number): number {
  let i = start + 1;
  while (i < text.length) {
    if (text[i] === '\\') {
      i += 2;
    } else if (text[i] === '"') {
      return i + 1;
    } else {
      i += 1;
    }
  }
  return text.length;
}

function skipIndentedString(text: string, start: number): number {
  let i = start + 2;
  while (i < text.length) {
    if (text.startsWith("'''", i)) {
      i += 3;
    } else if (text.startsWith("''", i)) {
      return i + 2;
    } else {
      i += 1;
    }
  }
  return text.length;
}

function skipString(text: string, start: number): number | null {
  if (text[start] === '"') {
    return skipDoubleQuoted(text, start);
  }
  if (text.startsWith("''", start)) {
    return skipIndentedString(text, start);
  }
  return null;
}

/**
 * Blank out `#` line comments and block comments, leaving strings intact.
 */
export function stripComments(text: string): string {
  let out = '';
  let i = 0;
  while (i < text.length) {
    const stringEnd = skipString(text, i);
    if (stringEnd !== null) {
      out += text.slice(i, stringEnd);
      i = stringEnd;
    } else if (text[i] === '#') {
      while (i < text.length && text[i] !== '\n') {
        i += 1;
      }
    } else if (text.startsWith('/*', i)) {
      const close = text.indexOf('*/', i + 2);
      i = close === -1 ? text.length : close + 2;
      out += ' ';
    } else {
      out += text[i];
      i += 1;
    }
  }
  return out;
}

/**
 * Index of the bracket closing the one at `open`, or -1 when unbalanced.
 */
function findClosing(text: string, open: number): number {
  const stack: string[] = [];
  let i = open;
  while (i < text.length) {
    const stringEnd = skipString(text, i);
    if (stringEnd !== null) {
      i = stringEnd;
      continue;
    }
    const ch = text[i];
    const closer = OPENERS[ch];
    if (closer) {
      stack.push(closer);
    } else if (ch === stack[stack.length - 1]) {
      stack.pop();
      if (stack.length === 0) {
        return i;
      }
    }
    i += 1;
  }
  return -1;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function findAssignment(text: string, key: string): number {
  const pattern = new RegExp(`(?:^|[\\s;{])${escapeRegExp(key)}\\s*=(?!=)`);
  const match = pattern.exec(text);
  return match ? match.index + match[0].length : -1;
}

function skipWhitespace(text: string, start: number): number {
  let i = start;
  while (i < text.length && /\s/.test(text[i])) {
    i += 1;
  }
  return i;
}

/**
 * Skip what may precede a list: parentheses, `with x;` clauses and function
 * applications such as `lib.mkForce` or `lib.optionals stdenv.isLinux`.
 */
function skipListPrefix(text: string, start: number): number {
  let i = skipWhitespace(text, start);
  for (;;) {
    if (text[i] === '(') {
      i = skipWhitespace(text, i + 1);
      continue;
    }
    const rest = text.slice(i);
    const withClause = /^with\s+[^;]+;/.exec(rest);
    if (withClause) {
      i = skipWhitespace(text, i + withClause[0].length);
      continue;
    }
    const applied = /^[A-Za-z_][\w'.-]*\s+(?=[[(A-Za-z_])/.exec(rest);
    if (applied) {
      i += applied[0].length;
      continue;
    }
    return i;
  }
}

/**
 * Parse the value after `key =`: one list, or several joined with `++`.
 * Returns the list bodies joined by newlines.
 */
function readListValue(text: string, start: number, key: string): string {
  const bodies: string[] = [];
  let i = start;
  for (;;) {
    i = skipListPrefix(text, i);
    if (text[i] !== '[') {
      throw new ConfigReadError(`Value of ${key} is not a list`);
    }
    const close = findClosing(text, i);
    if (close === -1) {
      throw new ConfigReadError(`Unbalanced list for ${key}`);
    }
    bodies.push(text.slice(i + 1, close));

    let next = skipWhitespace(text, close + 1);
    while (text[next] === ')') {
      next = skipWhitespace(text, next + 1);
    }
    if (!text.startsWith('++', next)) {
      return bodies.join('\n');
    }
    i = next + 2;
  }
}

function findListBody(text: string, keyParts: readonly string[]): string | null {
  const key = keyParts.join('.');
  const direct = findAssignment(text, key);
  if (direct !== -1) {
    return readListValue(text, direct, key);
  }

  // `a = { b = [ ... ]; }` spells `a.b`
  for (let split = keyParts.length - 1; split >= 1; split -= 1) {
    const prefix = keyParts.slice(0, split).join('.');
    const at = findAssignment(text, prefix);
    if (at === -1) {
      continue;
    }
    const open = skipWhitespace(text, at);
    if (text[open] !== '{') {
      continue;
    }
    const close = findClosing(text, open);
    if (close === -1) {
      throw new ConfigReadError(`Unbalanced attribute set for ${prefix}`);
    }
    const nested = findListBody(text.slice(open + 1, close), keyParts.slice(split));
    if (nested !== null) {
      return nested;
    }
  }
  return null;
}

function splitElements(body: string): string[] {
  const elements: string[] = [];
  let i = skipWhitespace(body, 0);
  while (i < body.length) {
    const stringEnd = skipString(body, i);
    let end: number;
    if (stringEnd !== null) {
      end = stringEnd;
    } else if (OPENERS[body[i]]) {
      const close = findClosing(body, i);
      if (close === -1) {
        throw new ConfigReadError('Unbalanced list element');
      }
      end = close + 1;
    } else {
      end = i;
      while (end < body.length && !/[\s[({"]/.test(body[end])) {
        end += 1;
      }
    }
    elements.push(body.slice(i, end));
    i = skipWhitespace(body, end);
  }
  return elements;
}

function normalizeElement(element: string): string {
  if (element.startsWith('"') && element.endsWith('"') && element.length >= 2) {
    return element.slice(1, -1);
  }
  return element.startsWith('pkgs.') ? element.slice('pkgs.'.length) : element;
}

/**
 * Values of the Nix list assigned to `key`, e.g. `environment.systemPackages
 * = with pkgs; [ git vim ];` → `['git', 'vim']`.
 */
export const readNixArray: ConfigurationReader = (content, key) => {
  const text = stripComments(content);
  const body = findListBody(text, key.split('.'));
  if (body === null) {
    throw new ConfigReadError(`Key ${key} not found`);
  }
  return splitElements(body).map(normalizeElement);
};
