/**
 * PEAR::DB compatibility
 *
 * Older call conventions (getAll, getAssoc, getOne...) expressed on top of
 * Connection.query() and the result cursor. Connection exposes each function
 * as a method of the same name; nothing here keeps state.
 */

import { FetchMode } from "../core/domain/value-objects/fetch-mode.js";
import type { ColumnSelector } from "../core/domain/value-objects/fetch-mode.js";
import type { ParamValue } from "../core/domain/value-objects/param-type.js";
import type { ResultCursor } from "../core/cursor/result-cursor.js";
import type { StatementCursor } from "../core/cursor/statement-cursor.js";
import type { Statement } from "../client/statement.js";
import {
  InvalidArgumentError,
  SqlTruncatedError,
  SqlUnsupportedError,
} from "../core/domain/errors/index.js";

/**
 * PEAR fetch modes. Default resolves to the connection's override, or
 * Ordered when none was set.
 */
export enum PearFetchMode {
  Default = 0,
  Ordered = 1,
  Assoc = 2,
  Object = 3,
}

/**
 * Result-side PEAR API
 */
export interface PearResult {
  fetchRow(mode?: FetchMode): unknown;
  numRows(): number;
  numCols(): number;
}

/**
 * What the shim needs from a connection
 */
export interface PearHost {
  query(query: string, params?: readonly ParamValue[]): Promise<ResultCursor | null>;
  begin(): Promise<void>;
  getAffectedRows(): number;
  getDefaultFetchMode(): FetchMode | null;
}

/**
 * Connection-side PEAR API
 */
export interface PearConnection {
  setFetchMode(mode: PearFetchMode): void;
  isError(): boolean;
  autoCommit(state: boolean): Promise<void>;
  affectedRows(): number;
  execute(
    statement: Statement,
    params?: ParamValue | readonly ParamValue[],
  ): Promise<StatementCursor | null>;
  getCol(query: string, column?: ColumnSelector, params?: readonly ParamValue[]): Promise<unknown[]>;
  getOne(query: string, params?: readonly ParamValue[]): Promise<unknown>;
  getRow(query: string, params?: readonly ParamValue[], fetchMode?: PearFetchMode): Promise<unknown>;
  getAll(query: string, params?: readonly ParamValue[], fetchMode?: PearFetchMode): Promise<unknown[]>;
  getAssoc(
    query: string,
    forceArray?: boolean,
    params?: readonly ParamValue[],
    fetchMode?: PearFetchMode,
    group?: boolean,
  ): Promise<Record<string, unknown>>;
}

export function toFetchMode(mode: Exclude<PearFetchMode, PearFetchMode.Default>): FetchMode {
  switch (mode) {
    case PearFetchMode.Ordered:
      return FetchMode.Ordered;
    case PearFetchMode.Assoc:
      return FetchMode.Assoc;
    case PearFetchMode.Object:
      return FetchMode.Object;
    default:
      throw new InvalidArgumentError(`Invalid fetch mode: ${String(mode)}`);
  }
}

export function resolveFetchMode(host: PearHost, mode: PearFetchMode): FetchMode {
  if (mode === PearFetchMode.Default) {
    return host.getDefaultFetchMode() ?? FetchMode.Ordered;
  }
  return toFetchMode(mode);
}

export async function autoCommit(host: PearHost, state: boolean): Promise<void> {
  if (state) {
    throw new SqlUnsupportedError("autoCommit(true) is not supported, use commit() or rollback()");
  }
  await host.begin();
}

export function affectedRows(host: PearHost): number {
  return host.getAffectedRows();
}

/**
 * Execute a prepared statement with a single value or a value list
 */
export async function execute(
  statement: Statement,
  params: ParamValue | readonly ParamValue[] = [],
): Promise<StatementCursor | null> {
  return isParamList(params) ? statement.execute(...params) : statement.execute(params);
}

/**
 * One column of every row
 */
export async function getCol(
  host: PearHost,
  query: string,
  column: ColumnSelector = 0,
  params: readonly ParamValue[] = [],
): Promise<unknown[]> {
  const result = requireResult(await host.query(query, params), query);
  return result.setFetchMode(FetchMode.Column, column).fetchAll();
}

/**
 * First column of the first row, null when there is none
 */
export async function getOne(
  host: PearHost,
  query: string,
  params: readonly ParamValue[] = [],
): Promise<unknown> {
  const result = requireResult(await host.query(query, params), query);
  return result.fetchColumn(0);
}

export async function getRow(
  host: PearHost,
  query: string,
  params: readonly ParamValue[] = [],
  fetchMode: PearFetchMode = PearFetchMode.Default,
): Promise<unknown> {
  const result = requireResult(await host.query(query, params), query);
  return result.next(resolveFetchMode(host, fetchMode));
}

export async function getAll(
  host: PearHost,
  query: string,
  params: readonly ParamValue[] = [],
  fetchMode: PearFetchMode = PearFetchMode.Default,
): Promise<unknown[]> {
  const result = requireResult(await host.query(query, params), query);
  return result.setFetchMode(resolveFetchMode(host, fetchMode)).fetchAll();
}

/**
 * Rows keyed by their first column.
 *
 * With exactly two columns (and forceArray off) each key maps to the second
 * column's value. Otherwise it maps to the remaining columns, shaped by the
 * fetch mode. With group set, values sharing a key are collected in a list;
 * without it, later rows overwrite earlier ones.
 */
export async function getAssoc(
  host: PearHost,
  query: string,
  forceArray = false,
  params: readonly ParamValue[] = [],
  fetchMode: PearFetchMode = PearFetchMode.Default,
  group = false,
): Promise<Record<string, unknown>> {
  const result = requireResult(await host.query(query, params), query);

  const fieldCount = result.fieldCount();
  if (fieldCount < 2) {
    throw new SqlTruncatedError(fieldCount);
  }

  const results = new Map<string, unknown>();
  const put = (key: unknown, value: unknown): void => {
    const name = toKey(key);
    if (!group) {
      results.set(name, value);
      return;
    }
    const list = results.get(name);
    if (Array.isArray(list)) list.push(value);
    else results.set(name, [value]);
  };

  if (fieldCount === 2 && !forceArray) {
    let row: unknown[] | null;
    while ((row = result.next(FetchMode.Ordered)) !== null) {
      put(row[0], row[1]);
    }
    return Object.fromEntries(results);
  }

  const mode = resolveFetchMode(host, fetchMode);

  if (mode === FetchMode.Assoc || mode === FetchMode.Object) {
    const [first = ""] = result.fieldNames();
    let row: Record<string, unknown> | null;
    while ((row = result.next(FetchMode.Assoc)) !== null) {
      const rest = { ...row };
      delete rest[first];
      put(row[first], rest);
    }
  } else {
    // shift the key off so remaining indices start at 0 again
    let row: unknown[] | null;
    while ((row = result.next(FetchMode.Ordered)) !== null) {
      const key = row.shift();
      put(key, row);
    }
  }

  return Object.fromEntries(results);
}

// ============================================
// Helpers
// ============================================

function requireResult(result: ResultCursor | null, query: string): ResultCursor {
  if (!result) {
    throw new InvalidArgumentError(`Query did not produce a result set: ${query}`);
  }
  return result;
}

function isParamList(
  params: ParamValue | readonly ParamValue[],
): params is readonly ParamValue[] {
  return Array.isArray(params);
}

function toKey(value: unknown): string {
  if (value === null || value === undefined) return "";
  return String(value);
}
