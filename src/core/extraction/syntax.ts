/**
 * Line-level syntax checks run before any marker is tokenized.
 */
import { ErrorCodes } from '../../utils/errors.js';
import type { MarkerRegistry } from '../markers/registry.js';
import type { CommentLine } from '../scanner/types.js';

const LEADING_MARKER = /^@([A-Z][A-Za-z0-9]*)/;

export interface SyntaxViolation {
  code: string;
  line: number;
  message: string;
}

/**
 * Check every comment line that starts with a marker. Returns the first
 * violation, or null when all lines are well formed.
 */
export function checkMarkerSyntax(
  lines: readonly CommentLine[],
  registry: MarkerRegistry
): SyntaxViolation | null {
  for (const { text, line } of lines) {
    const match = LEADING_MARKER.exec(text);
    if (!match) continue;

    const definition = registry.lookup(match[1]);
    if (definition && definition.arity.min > 0 && !text.includes('(')) {
      return {
        code: ErrorCodes.MALFORMED_MARKER,
        line,
        message: `Malformed marker '${text}': missing parentheses`,
      };
    }

    if (countChar(text, '"') % 2 !== 0) {
      return {
        code: ErrorCodes.UNMATCHED_QUOTES,
        line,
        message: `Unmatched quotes in '${text}'`,
      };
    }

    if (!parenthesesBalanced(text)) {
      return {
        code: ErrorCodes.UNMATCHED_PARENTHESES,
        line,
        message: `Unmatched parentheses in '${text}'`,
      };
    }
  }
  return null;
}

function countChar(text: string, char: string): number {
  let count = 0;
  for (const ch of text) {
    if (ch === char) count++;
  }
  return count;
}

/**
 * Parentheses inside double-quoted text are ignored.
 */
export function parenthesesBalanced(text: string): boolean {
  let depth = 0;
  let inQuotes = false;
  for (const ch of text) {
    if (ch === '"') {
      inQuotes = !inQuotes;
    } else if (!inQuotes && ch === '(') {
      depth++;
    } else if (!inQuotes && ch === ')') {
      depth--;
      if (depth < 0) return false;
    }
  }
  return depth === 0;
}
