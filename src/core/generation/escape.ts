/**
 * Quote `value` as a double-quoted TypeScript string literal.
 * The result parses back to exactly `value`.
 */
export function escapeString(value: string): string {
  let out = '"';
  for (const ch of value) {
    switch (ch) {
      case '\\':
        out += '\\\\';
        break;
      case '"':
        out += '\\"';
        break;
      case '\n':
        out += '\\n';
        break;
      case '\r':
        out += '\\r';
        break;
      case '\t':
        out += '\\t';
        break;
      case '\b':
        out += '\\b';
        break;
      case '\f':
        out += '\\f';
        break;
      case '\v':
        out += '\\v';
        break;
      case '\u2028':
        out += '\\u2028';
        break;
      case '\u2029':
        out += '\\u2029';
        break;
      default: {
        const code = ch.charCodeAt(0);
        // A lone surrogate has no UTF-8 encoding
        if (code < 0x20 || code === 0x7f || (ch.length === 1 && code >= 0xd800 && code <= 0xdfff)) {
          out += `\\u${code.toString(16).padStart(4, '0')}`;
        } else {
          out += ch;
        }
      }
    }
  }
  return `${out}"`;
}

const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

export function isIdentifier(value: string): boolean {
  return IDENTIFIER.test(value);
}

// Words a module-scope binding cannot take: ECMAScript keywords and
// literals, strict-mode words, and the TypeScript primitive type names
// an import may not shadow.
const RESERVED_WORDS = new Set([
  'break', 'case', 'catch', 'class', 'const', 'continue', 'debugger', 'default',
  'delete', 'do', 'else', 'enum', 'export', 'extends', 'false', 'finally', 'for',
  'function', 'if', 'import', 'in', 'instanceof', 'new', 'null', 'return', 'super',
  'switch', 'this', 'throw', 'true', 'try', 'typeof', 'var', 'void', 'while', 'with',
  'implements', 'interface', 'let', 'package', 'private', 'protected', 'public',
  'static', 'yield', 'await', 'arguments', 'eval',
  'any', 'unknown', 'never', 'number', 'bigint', 'boolean', 'string', 'symbol',
  'object', 'undefined',
]);

export function isReservedWord(value: string): boolean {
  return RESERVED_WORDS.has(value);
}

/**
 * An object literal key: bare when it is an identifier, quoted otherwise.
 */
export function formatKey(key: string): string {
  return isIdentifier(key) ? key : escapeString(key);
}
