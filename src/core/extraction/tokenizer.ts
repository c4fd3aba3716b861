/**
 * Single-pass marker tokenizer.
 *
 * A line is scanned once, left to right. Every `@Name` occurrence is
 * reported with its argument text when a parenthesized list follows.
 * An occurrence is leading when only whitespace and other leading
 * markers precede it on the line.
 */

export interface MarkerToken {
  name: string;
  /** Matched text, from `@` through the closing parenthesis if any */
  raw: string;
  /** Text between the parentheses, or null for a bare occurrence */
  argText: string | null;
  leading: boolean;
}

const NAME_START = /[A-Z]/;
const NAME_CHAR = /[A-Za-z0-9]/;
const WORD_CHAR = /[\w@.]/;

/**
 * Find marker occurrences in one comment line. An occurrence whose
 * parenthesis is never closed on the line is dropped.
 */
export function tokenizeLine(text: string): MarkerToken[] {
  const tokens: MarkerToken[] = [];
  let i = 0;
  // End of the last reported token while every token so far was leading
  let leadEnd: number | null = 0;

  while (i < text.length) {
    const at = text.indexOf('@', i);
    if (at === -1) break;

    // Skip e-mail addresses and the like
    if (at > 0 && WORD_CHAR.test(text[at - 1])) {
      i = at + 1;
      continue;
    }
    if (at + 1 >= text.length || !NAME_START.test(text[at + 1])) {
      i = at + 1;
      continue;
    }

    let end = at + 2;
    while (end < text.length && NAME_CHAR.test(text[end])) end++;
    const name = text.slice(at + 1, end);

    let open = end;
    while (open < text.length && (text[open] === ' ' || text[open] === '\t')) open++;

    const bare = text[open] !== '(';
    const close = bare ? end - 1 : findClosingParen(text, open);
    if (close === -1) {
      i = end;
      continue;
    }

    const leading: boolean = leadEnd !== null && text.slice(leadEnd, at).trim() === '';
    leadEnd = leading ? close + 1 : null;
    tokens.push({
      name,
      raw: text.slice(at, close + 1),
      argText: bare ? null : text.slice(open + 1, close),
      leading,
    });
    i = close + 1;
  }

  return tokens;
}

/**
 * Index of the `)` matching the `(` at `open`, ignoring parentheses in
 * double-quoted text. -1 if unmatched.
 */
export function findClosingParen(text: string, open: number): number {
  let depth = 0;
  let inQuotes = false;
  for (let i = open; i < text.length; i++) {
    const ch = text[i];
    if (inQuotes) {
      if (ch === '\\') i++;
      else if (ch === '"') inQuotes = false;
    } else if (ch === '"') {
      inQuotes = true;
    } else if (ch === '(') {
      depth++;
    } else if (ch === ')') {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

export type SplitResult =
  | { ok: true; args: string[] }
  | { ok: false; reason: string };

const OPENERS: Record<string, string> = { '(': ')', '[': ']', '{': '}' };

/**
 * Split argument text on top-level commas. Tokens are trimmed and lose
 * one layer of matching quotes. Whitespace-only text is an empty list.
 */
export function splitArguments(argText: string): SplitResult {
  if (argText.trim() === '') {
    return { ok: true, args: [] };
  }

  const parts: string[] = [];
  const closers: string[] = [];
  let quote: string | null = null;
  let current = '';

  for (let i = 0; i < argText.length; i++) {
    const ch = argText[i];

    if (quote) {
      current += ch;
      if (ch === '\\' && i + 1 < argText.length) {
        current += argText[++i];
      } else if (ch === quote) {
        quote = null;
      }
      continue;
    }

    if (ch === '"' || (ch === "'" && current.trim() === '')) {
      quote = ch;
      current += ch;
    } else if (ch in OPENERS) {
      closers.push(OPENERS[ch]);
      current += ch;
    } else if (closers.length > 0 && ch === closers[closers.length - 1]) {
      closers.pop();
      current += ch;
    } else if (ch === ',' && closers.length === 0) {
      parts.push(current);
      current = '';
    } else {
      current += ch;
    }
  }
  parts.push(current);

  const args: string[] = [];
  for (const part of parts) {
    const arg = stripQuotes(part.trim());
    if (arg === '') {
      return { ok: false, reason: 'empty argument found' };
    }
    args.push(arg);
  }
  return { ok: true, args };
}

/**
 * Remove one layer of matching `"` or `'` quotes.
 */
export function stripQuotes(value: string): string {
  if (value.length >= 2) {
    const first = value[0];
    if ((first === '"' || first === "'") && value[value.length - 1] === first) {
      return value.slice(1, -1);
    }
  }
  return value;
}
