/**
 * Buffered results
 *
 * In-memory row storage behind the driver port. mysql2 hands back whole
 * result sets, so seeking and fetching happen locally.
 */

import type { DriverResultSet } from "../../core/ports/driver.port.js";

export class BufferedResultSet implements DriverResultSet {
  private pointer = 0;

  constructor(
    private readonly names: readonly string[],
    private readonly rows: ReadonlyArray<readonly unknown[]>,
  ) {}

  get fieldCount(): number {
    return this.names.length;
  }

  get rowCount(): number {
    return this.rows.length;
  }

  fieldNames(): string[] {
    return [...this.names];
  }

  seek(position: number): void {
    this.pointer = position;
  }

  fetchRow(): unknown[] | null {
    const row = this.rows[this.pointer];
    if (row === undefined) return null;
    this.pointer++;
    return [...row];
  }
}

/**
 * Result storage of a prepared statement. fetch() copies the next row into
 * the bound buffer, slot by slot.
 */
export class BoundStatementResult {
  private names: readonly string[] = [];
  private rows: ReadonlyArray<readonly unknown[]> = [];
  private pointer = 0;
  private buffer: unknown[] | null = null;

  /** Replace the stored result after an execute; null for no result set */
  load(
    names: readonly string[] | null,
    rows: ReadonlyArray<readonly unknown[]>,
  ): void {
    this.names = names ?? [];
    this.rows = names ? rows : [];
    this.pointer = 0;
  }

  bind(buffer: unknown[]): void {
    this.buffer = buffer;
  }

  fetch(): boolean {
    const row = this.rows[this.pointer];
    if (row === undefined) return false;
    this.pointer++;

    const buffer = this.buffer;
    if (buffer) {
      for (let i = 0; i < buffer.length; i++) {
        buffer[i] = i < row.length ? row[i] : null;
      }
    }
    return true;
  }

  seek(position: number): void {
    this.pointer = position;
  }

  get fieldCount(): number {
    return this.names.length;
  }

  get rowCount(): number {
    return this.rows.length;
  }

  fieldNames(): string[] {
    return [...this.names];
  }
}
