import type { z } from 'zod';
import type { ResultAsync } from 'neverthrow';
import { errAsync, okAsync } from 'neverthrow';
import type { FileReadPort } from '../../../ports/fs.port.js';

export type ReferenceTableError =
  | { readonly code: 'TABLE_IO_ERROR'; readonly message: string }
  | { readonly code: 'TABLE_INVALID'; readonly message: string };

/**
 * Read a JSON reference table and parse it with `schema`.
 * Tables are read once at startup; any defect makes the whole table unusable.
 */
export function readJsonTable<T>(
  fs: FileReadPort,
  filePath: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): ResultAsync<T, ReferenceTableError> {
  return fs
    .readFileUtf8(filePath)
    .mapErr((e): ReferenceTableError => ({ code: 'TABLE_IO_ERROR', message: e.message }))
    .andThen((raw): ResultAsync<T, ReferenceTableError> => {
      let parsed: unknown;
      try {
        parsed = JSON.parse(raw);
      } catch {
        return errAsync({ code: 'TABLE_INVALID', message: `Invalid JSON in ${filePath}` } as const);
      }

      const validated = schema.safeParse(parsed);
      if (!validated.success) {
        const first = validated.error.errors[0];
        const where = first && first.path.length > 0 ? ` at ${first.path.join('.')}` : '';
        return errAsync({
          code: 'TABLE_INVALID',
          message: `Invalid table ${filePath}${where}: ${first?.message ?? 'unknown error'}`,
        } as const);
      }

      return okAsync(validated.data);
    });
}
