/**
 * Whitespace and comment minimization for generated TypeScript.
 *
 * Works on whole lines only: comments trailing code, and comment-like
 * text inside string literals, are left untouched.
 */

const KEEP_MARKERS = ['Code generated', 'DO NOT EDIT', 'eslint-disable', '@ts-nocheck'];

function isKept(comment: string): boolean {
  return KEEP_MARKERS.some((marker) => comment.includes(marker));
}

export function minifySource(source: string): string {
  const lines = source.split('\n');
  const out: string[] = [];
  let blockComment: { keep: boolean } | null = null;
  let importBlock: string[] | null = null;

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].replace(/[ \t]+$/, '');
    const trimmed = line.trim();

    if (blockComment) {
      if (blockComment.keep) out.push(line);
      if (trimmed.includes('*/')) blockComment = null;
      continue;
    }

    if (importBlock) {
      importBlock.push(trimmed);
      if (trimmed.startsWith('}')) {
        out.push(joinImport(importBlock));
        importBlock = null;
      }
      continue;
    }

    if (i === 0 && trimmed.startsWith('#!')) {
      out.push(line);
      continue;
    }

    if (trimmed.startsWith('//')) {
      if (isKept(trimmed)) out.push(line);
      continue;
    }

    if (trimmed.startsWith('/*')) {
      const keep = isKept(trimmed) || blockIsKept(lines, i);
      if (keep) out.push(line);
      if (!trimmed.includes('*/')) blockComment = { keep };
      continue;
    }

    if (/^import\b.*\{$/.test(trimmed)) {
      importBlock = [trimmed];
      continue;
    }

    if (trimmed === '') {
      if (out.length > 0 && out[out.length - 1] !== '') out.push('');
      continue;
    }

    out.push(line);
  }

  if (importBlock) {
    out.push(...importBlock);
  }

  while (out.length > 0 && out[out.length - 1] === '') out.pop();
  return `${out.join('\n')}\n`;
}

function blockIsKept(lines: readonly string[], start: number): boolean {
  for (let i = start; i < lines.length; i++) {
    if (isKept(lines[i])) return true;
    if (lines[i].includes('*/')) return false;
  }
  return false;
}

/**
 * `import {` / `a,` / `b,` / `} from 'x';` becomes `import { a, b } from 'x';`
 */
function joinImport(parts: readonly string[]): string {
  const head = parts[0];
  const tail = parts[parts.length - 1];
  const names = parts
    .slice(1, -1)
    .filter((part) => part !== '')
    .join(' ')
    .replace(/,$/, '');
  return names ? `${head} ${names} ${tail}` : `${head}${tail}`;
}
