/**
 * Format a greeting. Questions go to support@Example.test.
 */
export function greet(name: string): string {
  return `Hello, ${name}`;
}
