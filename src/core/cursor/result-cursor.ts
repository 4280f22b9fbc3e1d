/**
 * Result Cursor
 *
 * Forward-seekable view over one query's buffered result. Rows are
 * materialized from the driver on demand, in the configured fetch mode.
 */

import type { DriverResultSet } from "../ports/driver.port.js";
import {
  FetchMode,
  isColumnSelector,
  isFetchMode,
  type ColumnSelector,
  type RowClass,
} from "../domain/value-objects/fetch-mode.js";
import {
  InvalidArgumentError,
  OutOfRangeError,
  SqlNoSuchFieldError,
} from "../domain/errors/index.js";
import type { PearResult } from "../../legacy/pear-compat.js";

export class ResultCursor implements Iterable<unknown>, PearResult {
  protected position = 0;
  private fetchMode: FetchMode = FetchMode.Ordered;
  private column: ColumnSelector = 0;
  private rowClass: RowClass | null = null;

  constructor(protected readonly source: DriverResultSet) {}

  // ============================================
  // Configuration
  // ============================================

  /**
   * Set the mode used by next(), current(), fetchAll() and iteration.
   * Object mode takes an optional row class, Column mode a column selector.
   */
  setFetchMode(mode: FetchMode.Object, rowClass?: RowClass): this;
  setFetchMode(mode: FetchMode.Column, column?: ColumnSelector): this;
  setFetchMode(mode: FetchMode): this;
  setFetchMode(mode: FetchMode, arg?: ColumnSelector | RowClass): this {
    if (!isFetchMode(mode)) {
      throw new InvalidArgumentError(`Invalid fetch mode: ${String(mode)}`);
    }

    if (mode === FetchMode.Object) {
      this.rowClass = typeof arg === "function" ? arg : null;
    } else if (mode === FetchMode.Column) {
      const column = arg ?? 0;
      if (!isColumnSelector(column)) {
        throw new InvalidArgumentError("Column selector must be an integer or a name");
      }
      this.column = column;
    }

    this.fetchMode = mode;
    return this;
  }

  getFetchMode(): FetchMode {
    return this.fetchMode;
  }

  fieldCount(): number {
    return this.source.fieldCount;
  }

  rowCount(): number {
    return this.source.rowCount;
  }

  /** Column names in result order */
  fieldNames(): string[] {
    return [...this.source.fieldNames()];
  }

  // ============================================
  // Navigation
  // ============================================

  /**
   * Fetch the row at the current position and advance.
   * Returns null once every row has been read.
   */
  next(mode: FetchMode.Ordered): unknown[] | null;
  next(mode: FetchMode.Assoc): Record<string, unknown> | null;
  next(mode?: FetchMode): unknown;
  next(mode?: FetchMode): unknown {
    const effective = mode ?? this.fetchMode;
    if (!isFetchMode(effective)) {
      throw new InvalidArgumentError(`Invalid fetch mode: ${String(effective)}`);
    }

    if (this.position >= this.source.rowCount) return null;

    const values = this.source.fetchRow();
    if (values === null) return null;

    this.position++;
    return this.shape(values, effective);
  }

  /**
   * Peek at the row under the cursor without consuming it
   */
  current(): unknown {
    const start = this.position;
    try {
      return this.next();
    } finally {
      if (this.position !== start) {
        this.seek(start);
      }
    }
  }

  key(): number {
    return this.position;
  }

  valid(): boolean {
    return this.position >= 0 && this.position < this.source.rowCount;
  }

  seek(position: number): void {
    if (
      !Number.isInteger(position) ||
      position < 0 ||
      position > this.source.rowCount - 1
    ) {
      throw new OutOfRangeError(`Invalid seek position: ${position}`);
    }

    this.source.seek(position);
    this.position = position;
  }

  rewind(): void {
    if (this.source.rowCount === 0) {
      this.position = 0;
      return;
    }
    this.seek(0);
  }

  *[Symbol.iterator](): Generator<unknown, void, undefined> {
    this.rewind();
    while (this.valid()) {
      yield this.next();
    }
  }

  // ============================================
  // Bulk and single-field fetches
  // ============================================

  /**
   * Remaining rows, from the current position to the end
   */
  fetchAll(): unknown[] {
    const rows: unknown[] = [];
    while (this.valid()) {
      rows.push(this.next());
    }
    return rows;
  }

  /**
   * One field of the next row, by index or by name.
   * Null when there is no next row.
   */
  fetchColumn(column: ColumnSelector = 0): unknown {
    if (!isColumnSelector(column)) {
      throw new InvalidArgumentError("Column selector must be an integer or a name");
    }

    if (typeof column === "number") {
      const row = this.next(FetchMode.Ordered);
      if (row === null) return null;
      if (column < 0 || column >= row.length) {
        throw new OutOfRangeError(`No column at index ${column}`);
      }
      return row[column];
    }

    const row = this.next(FetchMode.Assoc);
    if (row === null) return null;
    if (!Object.hasOwn(row, column)) {
      throw new OutOfRangeError(`No column named ${column}`);
    }
    return row[column];
  }

  fetchArray(): unknown[] | null {
    return this.next(FetchMode.Ordered);
  }

  fetchAssoc(): Record<string, unknown> | null {
    return this.next(FetchMode.Assoc);
  }

  fetchObject(): object | null {
    const row = this.next(FetchMode.Object);
    return typeof row === "object" ? row : null;
  }

  // ============================================
  // PEAR::DB result API
  // ============================================

  fetchRow(mode?: FetchMode): unknown {
    return this.next(mode);
  }

  numRows(): number {
    return this.rowCount();
  }

  numCols(): number {
    return this.fieldCount();
  }

  // ============================================
  // Internals
  // ============================================

  protected restoreDefaults(): void {
    this.position = 0;
    this.fetchMode = FetchMode.Ordered;
    this.column = 0;
    this.rowClass = null;
  }

  private shape(values: unknown[], mode: FetchMode): unknown {
    switch (mode) {
      case FetchMode.Ordered:
        return values;
      case FetchMode.Assoc:
        return this.toRecord(values);
      case FetchMode.Object: {
        const fields = this.toRecord(values);
        return this.rowClass ? new this.rowClass(fields) : fields;
      }
      case FetchMode.Column:
        return this.pickColumn(values);
    }
  }

  // Later duplicate names overwrite earlier ones; own data properties only,
  // so a column named __proto__ stays a field
  private toRecord(values: unknown[]): Record<string, unknown> {
    const names = this.source.fieldNames();
    return Object.fromEntries(names.map((name, index) => [name, values[index]]));
  }

  private pickColumn(values: unknown[]): unknown {
    const column = this.column;

    if (typeof column === "number") {
      if (column < 0 || column >= values.length) {
        throw new SqlNoSuchFieldError(`No such field: ${column}`);
      }
      return values[column];
    }

    const record = this.toRecord(values);
    if (!Object.hasOwn(record, column)) {
      throw new SqlNoSuchFieldError(`No such field: ${column}`);
    }
    return record[column];
  }
}
