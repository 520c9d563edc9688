/**
 * @license
 * Copyright (c) 2016, Contributors
 * SPDX-License-Identifier: ISC
 */

export declare type TokenKind =
  | 'double-dash'
  | 'long-option'
  | 'short-group'
  | 'positional';

/** Classify one argv token; `-` and the empty string are positionals */
export function classifyToken(token: string): TokenKind {
  if (token === '--') return 'double-dash';
  if (token.length >= 3 && token.startsWith('--')) return 'long-option';
  if (token.length >= 2 && token[0] === '-' && token[1] !== '-') {
    return 'short-group';
  }
  return 'positional';
}

export interface LongOption {
  name: string;
  /** Inline value from `--name=value` */
  value?: string;
}

/** Strip `--` and split on the first `=` only */
export function splitLongOption(token: string): LongOption {
  const stripped = token.slice(2);
  const eq = stripped.indexOf('=');
  if (eq === -1) return {name: stripped};
  return {name: stripped.slice(0, eq), value: stripped.slice(eq + 1)};
}

/** Take argv string and tokenize it (Convert string -> string[]). */
export function tokenizeArgString(
  argString: string | readonly string[]
): string[] {
  if (typeof argString !== 'string') {
    return argString.slice();
  }

  argString = argString.trim();

  let i = 0;
  let prevC: string | null = null;
  let c: string | null = null;
  let opening: string | null = null;
  const args: string[] = [];

  for (let ii = 0; ii < argString.length; ii++) {
    prevC = c;
    c = argString.charAt(ii);

    // split on spaces unless we're in quotes.
    if (c === ' ' && !opening) {
      if (!(prevC === ' ')) {
        i++;
      }
      continue;
    }

    if (args[i] === undefined) args[i] = '';

    // don't split the string if we're in matching
    // opening or closing single and double quotes.
    if (c === opening) {
      opening = null;
      continue;
    } else if ((c === "'" || c === '"') && !opening) {
      opening = c;
      continue;
    }

    args[i] += c;
  }

  return args;
}
