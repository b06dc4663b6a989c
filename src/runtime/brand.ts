/**
 * Nominal tag over a structural type.
 *
 * Values such as a parsed chunk size or an encoded string carry a brand to show
 * they came through the function that checks them. Erased at runtime.
 *
 * String-keyed marker rather than a `unique symbol`, so exported zod-derived
 * types stay nameable in declaration output.
 */
export type Brand<T, B extends string> = T & { readonly __brand: B };
