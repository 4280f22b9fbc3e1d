/**
 * Statement Cursor
 *
 * Result cursor over a prepared statement execution. The driver statement
 * writes each fetched row into one bound buffer, so a statement can only
 * feed a single live cursor: re-executing resets and reuses it.
 */

import type { DriverResultSet, DriverStatement } from "../ports/driver.port.js";
import { ResultCursor } from "./result-cursor.js";

/**
 * Row source reading the statement's bound output buffer
 */
class BoundRowSource implements DriverResultSet {
  readonly buffer: unknown[];
  private names: string[] | null = null;

  constructor(private readonly statement: DriverStatement) {
    this.buffer = new Array<unknown>(statement.fieldCount).fill(null);
    statement.bindResult(this.buffer);
  }

  get fieldCount(): number {
    return this.buffer.length;
  }

  get rowCount(): number {
    return this.statement.rowCount;
  }

  // Metadata is read once; the statement text cannot change under us
  fieldNames(): string[] {
    if (this.names === null) {
      this.names = this.statement.resultFieldNames();
    }
    return this.names;
  }

  seek(position: number): void {
    this.statement.seek(position);
  }

  fetchRow(): unknown[] | null {
    // copy: the next fetch overwrites the buffer
    return this.statement.fetch() ? [...this.buffer] : null;
  }
}

export class StatementCursor extends ResultCursor {
  private readonly bound: BoundRowSource;

  constructor(statement: DriverStatement) {
    const bound = new BoundRowSource(statement);
    super(bound);
    this.bound = bound;
  }

  /**
   * Rewind to the first row and restore the default fetch mode
   */
  reset(): this {
    this.restoreDefaults();
    return this;
  }

  /** @internal identity of the bound output buffer */
  get boundBuffer(): readonly unknown[] {
    return this.bound.buffer;
  }
}
