/**
 * Driver Port
 *
 * What the cursors, statements and connections need from a native MySQL
 * client. The driver owns the socket, the wire protocol and result
 * buffering.
 */

import type { ParamValue } from "../domain/value-objects/param-type.js";

/**
 * Outcome of the last operation run through a handle
 */
export interface OperationStatus {
  readonly affectedRows: number;
  readonly insertId: number;
}

/**
 * Fully buffered result of an immediate query
 */
export interface DriverResultSet {
  readonly fieldCount: number;
  readonly rowCount: number;
  fieldNames(): string[];
  /** Move the physical row pointer */
  seek(position: number): void;
  /** Row at the pointer as ordered values, then advance; null past the end */
  fetchRow(): unknown[] | null;
}

export type DriverQueryResult =
  | { kind: "rows"; result: DriverResultSet }
  | { kind: "ok"; affectedRows: number; insertId: number };

export interface DriverStatement extends OperationStatus {
  /** Columns of the last execute's result set, 0 when it produced none */
  readonly fieldCount: number;
  /** Rows produced by the last execute */
  readonly rowCount: number;

  execute(values: readonly ParamValue[]): Promise<void>;

  /** Column names of the last execute's result set */
  resultFieldNames(): string[];

  /**
   * Register the output buffer. Every successful fetch() overwrites its
   * slots in place.
   */
  bindResult(buffer: unknown[]): void;

  /** Advance to the next row; false past the end */
  fetch(): boolean;

  seek(position: number): void;

  close(): Promise<void>;
}

export interface DriverConnection extends OperationStatus {
  readonly threadId: number | null;

  connect(): Promise<void>;
  /** Liveness probe, false when the link is down */
  ping(): Promise<boolean>;
  query(sql: string): Promise<DriverQueryResult>;
  prepare(sql: string): Promise<DriverStatement>;

  beginTransaction(): Promise<void>;
  commit(): Promise<void>;
  rollback(): Promise<void>;

  close(): Promise<void>;
}
