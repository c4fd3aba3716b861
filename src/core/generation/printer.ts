/**
 * Prints a ModuleIR as TypeScript source.
 */
import { escapeString, formatKey, isIdentifier } from './escape.js';
import type { Expr, ModuleIR, Statement } from './ir.js';
import type { OutputStyle } from './types.js';

const INDENT = '  ';

export function printModule(ir: ModuleIR, style: OutputStyle): string {
  const verbose = style === 'verbose';
  const out: string[] = [];

  for (const line of ir.header) {
    out.push(`// ${line}`);
  }
  if (verbose && ir.header.length > 0) out.push('');

  for (const imp of ir.imports) {
    out.push(`import * as ${imp.alias} from ${escapeString(imp.specifier)};`);
  }
  if (verbose) out.push('');

  for (const constant of ir.constants) {
    const type = constant.type ? `${verbose ? ': ' : ':'}${constant.type}` : '';
    const assign = verbose ? ' = ' : '=';
    out.push(`export const ${constant.name}${type}${assign}${printExpr(constant.value, 0, style)};`);
    if (verbose) out.push('');
  }

  const fn = ir.entryPoint;
  const sep = verbose ? ': ' : ':';
  out.push(
    `export function ${fn.name}(${fn.parameter.name}${sep}${fn.parameter.type})${sep}${fn.returnType}${verbose ? ' {' : '{'}`
  );
  for (const statement of fn.body) {
    out.push(`${verbose ? INDENT : ''}${printStatement(statement, verbose ? 1 : 0, style)}`);
  }
  out.push('}');

  return `${out.join('\n')}\n`;
}

function printStatement(statement: Statement, indent: number, style: OutputStyle): string {
  const expression = printExpr(statement.expression, indent, style);
  return statement.kind === 'return' ? `return ${expression};` : `${expression};`;
}

/**
 * Print an expression whose first line starts at `indent` levels.
 */
export function printExpr(expr: Expr, indent: number, style: OutputStyle): string {
  const verbose = style === 'verbose';
  const comma = verbose ? ', ' : ',';

  switch (expr.kind) {
    case 'string':
      return escapeString(expr.value);
    case 'number':
      return String(expr.value);
    case 'boolean':
      return expr.value ? 'true' : 'false';
    case 'identifier':
      return expr.name;
    case 'member':
      return isIdentifier(expr.property)
        ? `${printExpr(expr.object, indent, style)}.${expr.property}`
        : `${printExpr(expr.object, indent, style)}[${escapeString(expr.property)}]`;
    case 'call':
      return `${printExpr(expr.callee, indent, style)}(${expr.args
        .map((arg) => printExpr(arg, indent, style))
        .join(comma)})`;
    case 'array': {
      if (expr.elements.length === 0) return '[]';
      if (!verbose || expr.elements.every(isInline)) {
        return `[${expr.elements.map((el) => printExpr(el, indent, style)).join(comma)}]`;
      }
      const pad = INDENT.repeat(indent + 1);
      const items = expr.elements.map((el) => `${pad}${printExpr(el, indent + 1, style)},`);
      return `[\n${items.join('\n')}\n${INDENT.repeat(indent)}]`;
    }
    case 'object': {
      if (expr.properties.length === 0) return '{}';
      if (!verbose) {
        return `{${expr.properties
          .map((p) => `${formatKey(p.key)}:${printExpr(p.value, indent, style)}`)
          .join(',')}}`;
      }
      const pad = INDENT.repeat(indent + 1);
      const items = expr.properties.map(
        (p) => `${pad}${formatKey(p.key)}: ${printExpr(p.value, indent + 1, style)},`
      );
      return `{\n${items.join('\n')}\n${INDENT.repeat(indent)}}`;
    }
  }
}

/**
 * Expressions printed on a single line in verbose style.
 */
function isInline(expr: Expr): boolean {
  switch (expr.kind) {
    case 'call':
      return expr.args.every(isInline);
    case 'array':
      return expr.elements.every(isInline);
    case 'object':
      return expr.properties.length === 0;
    default:
      return true;
  }
}
