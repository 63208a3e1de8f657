/**
 * Common utility types for the provisioning options library
 */

/**
 * A value that may be explicitly null (intentional absence).
 * @example const middleName: Nullable<string> = null; // intentionally empty
 */
export type Nullable<T> = T | null;

/**
 * A value that may be null or undefined (nullish).
 * Setters accept this shape at their boundary and reject the nullish half.
 */
export type Maybe<T> = T | null | undefined;

/**
 * Helper predicate for nullish checks.
 * @example
 * ```typescript
 * if (!isNullish(apiResponse)) {
 *   // apiResponse: string
 * }
 * ```
 */
export const isNullish = (v: unknown): v is null | undefined => v == null;

export interface Present<T> {
  readonly present: true;
  readonly value: T;
}

export interface Absent {
  readonly present: false;
}

/**
 * Explicit present/absent container.
 * Unlike `T | undefined`, a present `0`, `''` or `false` is never mistaken for "not set".
 */
export type Optional<T> = Present<T> | Absent;

const ABSENT: Absent = Object.freeze({ present: false as const });

function of<T>(value: T): Optional<T> {
  return Object.freeze({ present: true as const, value });
}

export const Optional = {
  of,

  absent<T = never>(): Optional<T> {
    return ABSENT;
  },

  fromNullable<T>(value: Maybe<T>): Optional<T> {
    return isNullish(value) ? ABSENT : of(value);
  },

  isPresent<T>(opt: Optional<T>): opt is Present<T> {
    return opt.present;
  },

  getOrElse<T>(opt: Optional<T>, fallback: T): T {
    return opt.present ? opt.value : fallback;
  },

  map<T, U>(opt: Optional<T>, fn: (value: T) => U): Optional<U> {
    return opt.present ? of(fn(opt.value)) : ABSENT;
  },
} as const;
