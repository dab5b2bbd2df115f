import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import type { MissingAttributeError } from '../errors.js';
import { DatastoreErr } from '../errors.js';

export type WithAttributes<H, K extends keyof H> = H & { readonly [P in K]-?: NonNullable<H[P]> };

function isSet(value: unknown): boolean {
  return value !== undefined && value !== null && value !== '';
}

export function hasAttributes<H extends object, K extends keyof H>(
  handler: H,
  keys: readonly K[]
): handler is WithAttributes<H, K> {
  return keys.every((key) => isSet(handler[key]));
}

/**
 * All-or-nothing identity check: either every attribute an operation needs is
 * set, or the operation fails naming every missing one.
 */
export function requireAttributes<H extends object, K extends keyof H>(
  handler: H,
  operation: string,
  keys: readonly K[]
): Result<WithAttributes<H, K>, MissingAttributeError> {
  if (hasAttributes(handler, keys)) return ok(handler);

  const missing = keys.filter((key) => !isSet(handler[key])).map(String);
  return err(DatastoreErr.missingAttribute(operation, missing));
}

/** Join folder segments with `/`, skipping empty ones. */
export function joinSegments(...segments: readonly (string | undefined)[]): string {
  return segments
    .filter((s): s is string => s !== undefined && s.length > 0)
    .map((s) => s.replace(/^\/+|\/+$/g, ''))
    .filter((s) => s.length > 0)
    .join('/');
}

/** Last segment of a path (either separator). */
export function baseName(path: string): string {
  const parts = path.split(/[\\/]/);
  return parts[parts.length - 1] ?? path;
}

/** Parent folder segment of a path, if the path has one. */
export function parentSegment(path: string): string | undefined {
  const parts = path.split(/[\\/]/).filter((p) => p.length > 0);
  return parts.length >= 2 ? parts[parts.length - 2] : undefined;
}
