/**
 * Type definitions for comment markers.
 */

/**
 * What a marker contributes to a route record. Assembly switches on the
 * role, never on the marker name.
 */
export type MarkerRole =
  | 'route'
  | 'behavior'
  | 'websocket'
  | 'group'
  | 'param'
  | 'response'
  | 'description'
  | 'summary'
  | 'tag'
  | 'schema';

/**
 * Accepted argument count. `max` undefined means unbounded.
 */
export interface MarkerArity {
  min: number;
  max?: number;
  /** Shown in argument-count errors, e.g. "method, path" */
  usage?: string;
}

/**
 * Runtime call a behavior marker expands to.
 */
export interface BehaviorDescriptor {
  /** Export of the runtime module, e.g. createAuthMiddleware */
  factory: string;
  args: string[];
  description?: string;
}

/**
 * A domain rule violation reported by a definition's `validate`.
 */
export interface DomainViolation {
  code: string;
  message: string;
}

export interface MarkerDefinition {
  name: string;
  role: MarkerRole;
  arity: MarkerArity;
  /** The raw occurrence must match for it to count */
  pattern?: RegExp;
  factory?: (args: string[]) => BehaviorDescriptor;
  validate?: (args: string[]) => DomainViolation[];
  description?: string;
}

/**
 * One occurrence of a registered marker in a comment.
 */
export interface MarkerInstance {
  name: string;
  raw: string;
  args: string[];
  line: number;
}
