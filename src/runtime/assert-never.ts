/**
 * Exhaustiveness check for `switch` over a discriminated union.
 * Adding a member to the union makes every unhandled switch a compile error.
 */
export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(value)}`);
}
