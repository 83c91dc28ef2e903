/**
 * Thrown when a value or cap handed to a capped multiset is not a
 * non-negative integer. The underlying `ZodError`, if any, is the `cause`.
 */
export class InvalidInput extends Error {}
