/**
 * mysql2 Driver (Default)
 *
 * Wraps a mysql2/promise connection to implement the driver port. Rows are
 * requested as arrays so duplicate column names survive until the cursor
 * decides how to shape them.
 */

import mysql from "mysql2/promise";
import type {
  Connection as Mysql2Connection,
  ConnectionOptions as Mysql2Options,
  PreparedStatementInfo,
} from "mysql2/promise";
import type {
  DriverConnection,
  DriverQueryResult,
  DriverStatement,
} from "../../core/ports/driver.port.js";
import type { ParamValue } from "../../core/domain/value-objects/param-type.js";
import {
  SqlConnectFailedError,
  SqlNotConnectedError,
  errorFromCode,
} from "../../core/domain/errors/index.js";
import type { ConnectionInfo, ConnectionOptions } from "../../config/defaults.js";
import { BoundStatementResult, BufferedResultSet } from "./buffered-result.js";

export class Mysql2Driver implements DriverConnection {
  private connection: Mysql2Connection | null = null;
  private lastAffectedRows = 0;
  private lastInsertId = 0;

  constructor(
    private readonly info: ConnectionInfo,
    private readonly options: ConnectionOptions,
  ) {}

  get affectedRows(): number {
    return this.lastAffectedRows;
  }

  get insertId(): number {
    return this.lastInsertId;
  }

  get threadId(): number | null {
    return this.connection?.threadId ?? null;
  }

  async connect(): Promise<void> {
    if (this.connection) {
      this.connection.destroy();
      this.connection = null;
    }

    try {
      this.connection = await mysql.createConnection(
        toMysql2Options(this.info, this.options),
      );
    } catch (err) {
      if (isMysqlError(err)) {
        throw new SqlConnectFailedError(err.message, err.errno, err.sqlState ?? null);
      }
      throw new SqlConnectFailedError(errorMessage(err));
    }
  }

  async ping(): Promise<boolean> {
    if (!this.connection) return false;

    try {
      await this.connection.ping();
      return true;
    } catch (err) {
      console.warn(`[Connection] Ping failed: ${errorMessage(err)}`);
      return false;
    }
  }

  async query(sql: string): Promise<DriverQueryResult> {
    const connection = this.requireConnection();

    try {
      const [result, fields] = await connection.query(sql);

      if (!Array.isArray(result)) {
        this.lastAffectedRows = result.affectedRows;
        this.lastInsertId = result.insertId;
        return {
          kind: "ok",
          affectedRows: result.affectedRows,
          insertId: result.insertId,
        };
      }

      const names = (fields ?? []).map((field) => field.name);
      const list: unknown[] = result;
      const rows = list.map((row) => toValues(row, names));
      this.lastAffectedRows = rows.length;
      return { kind: "rows", result: new BufferedResultSet(names, rows) };
    } catch (err) {
      throw toSqlError(err);
    }
  }

  async prepare(sql: string): Promise<DriverStatement> {
    const connection = this.requireConnection();

    try {
      return new Mysql2Statement(await connection.prepare(sql));
    } catch (err) {
      throw toSqlError(err);
    }
  }

  async beginTransaction(): Promise<void> {
    try {
      await this.requireConnection().beginTransaction();
    } catch (err) {
      throw toSqlError(err);
    }
  }

  async commit(): Promise<void> {
    try {
      await this.requireConnection().commit();
    } catch (err) {
      throw toSqlError(err);
    }
  }

  async rollback(): Promise<void> {
    try {
      await this.requireConnection().rollback();
    } catch (err) {
      throw toSqlError(err);
    }
  }

  async close(): Promise<void> {
    const connection = this.connection;
    this.connection = null;
    if (connection) {
      await connection.end();
    }
  }

  private requireConnection(): Mysql2Connection {
    if (!this.connection) {
      throw new SqlNotConnectedError();
    }
    return this.connection;
  }
}

class Mysql2Statement implements DriverStatement {
  private readonly result = new BoundStatementResult();
  private lastAffectedRows = 0;
  private lastInsertId = 0;

  constructor(private readonly statement: PreparedStatementInfo) {}

  get affectedRows(): number {
    return this.lastAffectedRows;
  }

  get insertId(): number {
    return this.lastInsertId;
  }

  get fieldCount(): number {
    return this.result.fieldCount;
  }

  get rowCount(): number {
    return this.result.rowCount;
  }

  async execute(values: readonly ParamValue[]): Promise<void> {
    try {
      const [result, fields] = await this.statement.execute([...values]);

      if (!Array.isArray(result)) {
        this.lastAffectedRows = result.affectedRows;
        this.lastInsertId = result.insertId;
        this.result.load(null, []);
        return;
      }

      const names = (fields ?? []).map((field) => field.name);
      const list: unknown[] = result;
      const rows = list.map((row) => toValues(row, names));
      this.lastAffectedRows = rows.length;
      this.result.load(names, rows);
    } catch (err) {
      throw toSqlError(err);
    }
  }

  resultFieldNames(): string[] {
    return this.result.fieldNames();
  }

  bindResult(buffer: unknown[]): void {
    this.result.bind(buffer);
  }

  fetch(): boolean {
    return this.result.fetch();
  }

  seek(position: number): void {
    this.result.seek(position);
  }

  async close(): Promise<void> {
    await this.statement.close();
  }
}

// ============================================
// Helpers
// ============================================

export function toMysql2Options(
  info: ConnectionInfo,
  options: ConnectionOptions,
): Mysql2Options {
  const flags = [options.foundRows ? "FOUND_ROWS" : "-FOUND_ROWS"];
  if (options.compression) flags.push("COMPRESS");
  if (options.ignoreSpace) flags.push("IGNORE_SPACE");
  if (options.clientInteractive) flags.push("INTERACTIVE");

  const config: Mysql2Options = {
    host: info.hostname ?? "localhost",
    user: info.username ?? undefined,
    password: info.password ?? undefined,
    database: info.database ?? undefined,
    port: info.port ?? undefined,
    socketPath: info.socket ?? undefined,
    flags,
    rowsAsArray: true,
    multipleStatements: false,
  };

  if (options.ssl) config.ssl = {};
  if (options.connectTimeout > 0) config.connectTimeout = options.connectTimeout * 1000;

  return config;
}

interface MysqlError extends Error {
  errno: number;
  sqlState?: string;
  sqlMessage?: string;
}

function isMysqlError(err: unknown): err is MysqlError {
  return err instanceof Error && "errno" in err && typeof err.errno === "number";
}

function toSqlError(err: unknown): Error {
  if (isMysqlError(err)) {
    return errorFromCode(err.errno, err.sqlMessage ?? err.message, err.sqlState ?? null);
  }
  return err instanceof Error ? err : new Error(String(err));
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function toValues(row: unknown, names: readonly string[]): unknown[] {
  if (Array.isArray(row)) return [...row];
  if (isRecord(row)) return names.map((name) => row[name]);
  return [];
}
