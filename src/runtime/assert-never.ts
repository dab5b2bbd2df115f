/**
 * Exhaustiveness check for `_tag` / `kind` unions. A new member that a switch
 * does not handle fails to compile.
 */
export function assertNever(x: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(x)}`);
}
