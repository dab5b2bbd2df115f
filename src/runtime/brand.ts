/**
 * Nominal typing for values that passed a parser at a boundary
 * (fingerprints, config paths, validated config).
 *
 * A string-keyed marker rather than a `unique symbol`, so that exported Zod
 * schemas transforming into branded types can still be named (TS4023).
 */
export type Brand<T, B extends string> = T & { readonly __brand: B };
