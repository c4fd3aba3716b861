/**
 * Turns a declaration's doc comment into an ordered list of marker
 * instances, collecting every validation error along the way.
 */
import { ValidationError, ErrorCodes } from '../../utils/errors.js';
import type { MarkerRegistry } from '../markers/registry.js';
import type { MarkerArity, MarkerDefinition, MarkerInstance } from '../markers/types.js';
import type { ScannedDeclaration } from '../scanner/types.js';
import { checkMarkerSyntax } from './syntax.js';
import { splitArguments, tokenizeLine } from './tokenizer.js';

export interface ExtractionResult {
  markers: MarkerInstance[];
  errors: ValidationError[];
}

/**
 * Extract and validate the markers of one declaration.
 *
 * @param file Path reported in errors, relative to the scanned root
 */
export function extractMarkers(
  declaration: ScannedDeclaration,
  file: string,
  registry: MarkerRegistry
): ExtractionResult {
  const violation = checkMarkerSyntax(declaration.comment, registry);
  if (violation) {
    return {
      markers: [],
      errors: [new ValidationError(violation.code, file, violation.line, violation.message)],
    };
  }

  const markers: MarkerInstance[] = [];
  const errors: ValidationError[] = [];
  let hasRoute = false;

  for (const { text, line } of declaration.comment) {
    for (const token of tokenizeLine(text)) {
      const definition = registry.lookup(token.name);
      if (!definition) continue;
      // A bare name counts only as part of a marker line, not inside prose
      if (token.argText === null && (definition.arity.min > 0 || !token.leading)) continue;
      if (definition.pattern && !matchesPattern(definition.pattern, token.raw)) continue;

      const split = splitArguments(token.argText ?? '');
      if (!split.ok) {
        errors.push(new ValidationError(
          ErrorCodes.INVALID_ARGUMENTS,
          file,
          line,
          `Error in @${definition.name} arguments: ${split.reason}`
        ));
        continue;
      }

      const arityMessage = checkArity(definition, split.args.length);
      if (arityMessage) {
        errors.push(new ValidationError(ErrorCodes.INVALID_ARGUMENT_COUNT, file, line, arityMessage));
        continue;
      }

      const violations = definition.validate?.(split.args) ?? [];
      for (const v of violations) {
        errors.push(new ValidationError(v.code, file, line, v.message));
      }
      if (violations.length > 0) continue;

      if (definition.role === 'route') {
        if (hasRoute) {
          errors.push(new ValidationError(
            ErrorCodes.DUPLICATE_ROUTE,
            file,
            line,
            `'${declaration.name}' already has a @${definition.name} marker`
          ));
          continue;
        }
        hasRoute = true;
      }

      markers.push({ name: definition.name, raw: token.raw, args: split.args, line });
    }
  }

  if (
    declaration.kind === 'function' &&
    declaration.exportName === null &&
    producesRecord(markers, registry)
  ) {
    errors.push(new ValidationError(
      ErrorCodes.HANDLER_NOT_EXPORTED,
      file,
      declaration.line,
      `Handler '${declaration.name}' must be exported to be registered`
    ));
  }

  return { markers, errors };
}

/**
 * A function declaration yields a record when it has a route, or a
 * websocket marker with message types.
 */
export function producesRecord(markers: readonly MarkerInstance[], registry: MarkerRegistry): boolean {
  return markers.some((marker) => {
    const role = registry.lookup(marker.name)?.role;
    return role === 'route' || (role === 'websocket' && marker.args.length > 0);
  });
}

/**
 * Returns the error message when `count` is outside the definition's arity.
 */
export function checkArity(definition: MarkerDefinition, count: number): string | null {
  const { min, max } = definition.arity;
  if (count >= min && (max === undefined || count <= max)) {
    return null;
  }
  return `@${definition.name} requires ${describeArity(definition.arity)}, found ${count}`;
}

function describeArity({ min, max, usage }: MarkerArity): string {
  let text: string;
  if (max === min) {
    text = `exactly ${min} ${plural(min)}`;
  } else if (max === undefined) {
    text = `at least ${min} ${plural(min)}`;
  } else {
    text = `between ${min} and ${max} arguments`;
  }
  return usage ? `${text} (${usage})` : text;
}

function plural(n: number): string {
  return n === 1 ? 'argument' : 'arguments';
}

function matchesPattern(pattern: RegExp, raw: string): boolean {
  pattern.lastIndex = 0;
  return pattern.test(raw);
}
