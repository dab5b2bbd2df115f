/**
 * Port for terminating the current process.
 * Only composition roots (the CLI) use it.
 */
export type TerminationCode =
  | { readonly kind: 'success' }
  | { readonly kind: 'failure' }
  | { readonly kind: 'misuse' };

export interface ProcessTerminator {
  terminate(code: TerminationCode): never;
}
