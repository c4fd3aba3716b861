/**
 * Intermediate representation of the generated module.
 *
 * The generator builds this tree from the generation context; only the
 * printer turns it into text, so every string literal passes through a
 * single escaping routine.
 */
import type { ImportSpec } from './types.js';

export type Expr =
  | { kind: 'string'; value: string }
  | { kind: 'number'; value: number }
  | { kind: 'boolean'; value: boolean }
  | { kind: 'identifier'; name: string }
  | { kind: 'member'; object: Expr; property: string }
  | { kind: 'call'; callee: Expr; args: Expr[] }
  | { kind: 'array'; elements: Expr[] }
  | { kind: 'object'; properties: Property[] };

export interface Property {
  key: string;
  value: Expr;
}

export type Statement =
  | { kind: 'expression'; expression: Expr }
  | { kind: 'return'; expression: Expr };

export interface ConstDeclaration {
  name: string;
  /** Type annotation, printed as written */
  type?: string;
  value: Expr;
}

export interface FunctionDeclaration {
  name: string;
  parameter: { name: string; type: string };
  returnType: string;
  body: Statement[];
}

export interface ModuleIR {
  /** Comment lines printed first, without delimiters */
  header: string[];
  imports: ImportSpec[];
  constants: ConstDeclaration[];
  entryPoint: FunctionDeclaration;
}

export const str = (value: string): Expr => ({ kind: 'string', value });
export const num = (value: number): Expr => ({ kind: 'number', value });
export const bool = (value: boolean): Expr => ({ kind: 'boolean', value });
export const ident = (name: string): Expr => ({ kind: 'identifier', name });
export const member = (object: Expr, property: string): Expr => ({ kind: 'member', object, property });
export const call = (callee: Expr, args: Expr[]): Expr => ({ kind: 'call', callee, args });
export const arr = (elements: Expr[]): Expr => ({ kind: 'array', elements });

/**
 * Object literal from entries; entries whose value is undefined are left out.
 */
export function obj(entries: ReadonlyArray<readonly [string, Expr | undefined]>): Expr {
  const properties: Property[] = [];
  for (const [key, value] of entries) {
    if (value !== undefined) {
      properties.push({ key, value });
    }
  }
  return { kind: 'object', properties };
}
