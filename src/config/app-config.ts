/**
 * Application configuration - parse, don't validate.
 *
 * The environment is read once at the composition root. Zod validates it and
 * the result is a branded, immutable AppConfig; errors are data, never thrown.
 */

import * as path from 'node:path';
import { z } from 'zod';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';
import type { Brand } from '../runtime/brand.js';
import { Err } from '../errors/factories.js';
import type { ConfigInvalidError, ConfigIssue, ValidatedAppConfig } from '../errors/app-error.js';
import type { LogLevel } from '../core/logging/index.js';
import { LOG_LEVELS } from '../core/logging/index.js';
import { BUNDLED_HK_PACKETS_FILE, BUNDLED_SPICE_KERNELS_FILE } from './resources.js';

// =============================================================================
// Branded primitives (prove parsing/validation happened)
// =============================================================================

export type DatastoreRoot = Brand<string, 'DatastoreRoot'>;
export type DatabaseUrl = Brand<string, 'DatabaseUrl'>;
export type ReferenceTableFile = Brand<string, 'ReferenceTableFile'>;

export type IndexBackend =
  | { readonly kind: 'postgres'; readonly databaseUrl: DatabaseUrl }
  | { readonly kind: 'in_memory' };

export interface AppConfig {
  /** Absent when DATASTORE_ROOT is unset; commands that touch the store require it. */
  readonly root: DatastoreRoot | undefined;
  readonly index: IndexBackend;
  readonly referenceTables: {
    readonly hkPacketsFile: ReferenceTableFile;
    readonly spiceKernelsFile: ReferenceTableFile;
  };
  readonly logLevel: LogLevel;
  readonly softwareVersion: string;
}

export type ValidatedConfig = ValidatedAppConfig<AppConfig>;

export interface LoadConfigOptions {
  readonly env: Record<string, string | undefined>;
  /** Relative paths in the environment resolve against this directory. */
  readonly cwd: string;
}

export const DEFAULT_SOFTWARE_VERSION = '0.1.0';

// =============================================================================
// Schema (single source of truth for validation + types)
// =============================================================================

const optionalNonEmpty = z
  .string()
  .optional()
  .transform((v) => (v === undefined || v.trim() === '' ? undefined : v.trim()));

const EnvSchema = z.object({
  DATASTORE_ROOT: optionalNonEmpty,

  DATASTORE_DATABASE_URL: optionalNonEmpty.superRefine((v, ctx) => {
    if (v !== undefined && !/^postgres(?:ql)?:\/\/\S+$/.test(v)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'DATASTORE_DATABASE_URL must be a postgres:// or postgresql:// connection string',
      });
    }
  }),

  DATASTORE_LOG_LEVEL: z
    .string()
    .optional()
    .transform((v) => v?.toLowerCase())
    .pipe(z.enum(LOG_LEVELS).default('silent')),

  DATASTORE_HK_PACKETS_FILE: optionalNonEmpty,
  DATASTORE_SPICE_KERNELS_FILE: optionalNonEmpty,

  DATASTORE_SOFTWARE_VERSION: optionalNonEmpty,
});

type ParsedEnv = z.infer<typeof EnvSchema>;

// =============================================================================
// Public API
// =============================================================================

export type LoadConfigResult = Result<ValidatedConfig, ConfigInvalidError>;

export function loadConfig(options: LoadConfigOptions): LoadConfigResult {
  const parsed = EnvSchema.safeParse(options.env);

  if (!parsed.success) {
    return err(Err.configInvalid(toConfigIssues(parsed.error)));
  }

  return ok(buildConfig(parsed.data, options.cwd) as ValidatedConfig);
}

/**
 * Tests and local construction only: creates a validated config without env parsing.
 * (Still branded as validated to prevent accidentally passing raw objects.)
 */
export function createValidatedConfig(value: AppConfig): ValidatedConfig {
  return value as ValidatedConfig;
}

// =============================================================================
// Internal
// =============================================================================

function buildConfig(env: ParsedEnv, cwd: string): AppConfig {
  const resolve = (p: string): string => path.resolve(cwd, p);

  const index: IndexBackend =
    env.DATASTORE_DATABASE_URL === undefined
      ? { kind: 'in_memory' }
      : { kind: 'postgres', databaseUrl: env.DATASTORE_DATABASE_URL as DatabaseUrl };

  return {
    root: env.DATASTORE_ROOT === undefined ? undefined : (resolve(env.DATASTORE_ROOT) as DatastoreRoot),
    index,
    referenceTables: {
      hkPacketsFile: (env.DATASTORE_HK_PACKETS_FILE === undefined
        ? BUNDLED_HK_PACKETS_FILE
        : resolve(env.DATASTORE_HK_PACKETS_FILE)) as ReferenceTableFile,
      spiceKernelsFile: (env.DATASTORE_SPICE_KERNELS_FILE === undefined
        ? BUNDLED_SPICE_KERNELS_FILE
        : resolve(env.DATASTORE_SPICE_KERNELS_FILE)) as ReferenceTableFile,
    },
    logLevel: env.DATASTORE_LOG_LEVEL,
    softwareVersion: env.DATASTORE_SOFTWARE_VERSION ?? DEFAULT_SOFTWARE_VERSION,
  };
}

function toConfigIssues(error: z.ZodError): readonly ConfigIssue[] {
  return error.errors.map((issue) => ({
    path: issue.path.length ? issue.path.join('.') : '(root)',
    message: issue.message,
  }));
}
