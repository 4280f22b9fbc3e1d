/**
 * Fetch Mode Value Object
 *
 * Shape in which a cursor materializes a row.
 */

export enum FetchMode {
  /** Array of values in column order */
  Ordered = 1,
  /** Record keyed by column name */
  Assoc = 2,
  /** Instance of the configured row class (plain object by default) */
  Object = 3,
  /** A single field of the row */
  Column = 4,
}

/** Column index or column name */
export type ColumnSelector = number | string;

/**
 * Target type for FetchMode.Object. The constructor receives the row as a
 * record keyed by column name.
 */
export type RowClass<T extends object = object> = new (
  fields: Record<string, unknown>,
) => T;

export function isFetchMode(value: unknown): value is FetchMode {
  return (
    value === FetchMode.Ordered ||
    value === FetchMode.Assoc ||
    value === FetchMode.Object ||
    value === FetchMode.Column
  );
}

export function isColumnSelector(value: unknown): value is ColumnSelector {
  return (
    typeof value === "string" ||
    (typeof value === "number" && Number.isInteger(value))
  );
}
