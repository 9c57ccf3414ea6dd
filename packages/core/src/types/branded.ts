/**
 * Branded Types
 *
 * Branded types prevent accidental misuse of structurally identical types.
 * A calendar date and a free-text note are both strings on the wire; only
 * text that passed date validation may be used where a CalendarDate is
 * expected.
 *
 * @module types/branded
 */

/**
 * Unique symbol used as the brand key.
 */
declare const __brand: unique symbol;

/**
 * Brand type that adds a nominal type tag to a base type.
 * The brand is a phantom type - it exists only at compile time.
 */
export type Brand<T, Brand extends string> = T & {
  readonly [__brand]: Brand;
};

/**
 * A calendar day in its canonical clinic form, YYYYMMDD (e.g. 20210123).
 * Lexicographic order of two CalendarDates is their chronological order.
 */
export type CalendarDate = Brand<string, 'CalendarDate'>;
