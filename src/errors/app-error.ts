import type { Brand } from '../runtime/brand.js';

export type ConfigIssue = Readonly<{
  readonly path: string;
  readonly message: string;
}>;

export type ConfigInvalidError = Readonly<{
  readonly _tag: 'ConfigInvalid';
  readonly issues: readonly ConfigIssue[];
  readonly message: string;
}>;

/** Composition-root phases that can fail before any command runs. */
export type StartupPhase = 'reference-tables' | 'index-store';

export type StartupFailedError = Readonly<{
  readonly _tag: 'StartupFailed';
  readonly phase: StartupPhase;
  readonly message: string;
  readonly cause?: unknown;
}>;

export type UnexpectedError = Readonly<{
  readonly _tag: 'Unexpected';
  readonly message: string;
  readonly cause: unknown;
}>;

export type AppError = ConfigInvalidError | StartupFailedError | UnexpectedError;

/**
 * Marks a config value that came out of `loadConfig` (or the test helper),
 * so consumers never accept a raw object.
 */
export type ValidatedAppConfig<T> = Brand<T, 'ValidatedAppConfig'>;
