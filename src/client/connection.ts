/**
 * Connection
 *
 * Entry point of the library. Owns the driver connection, connects lazily,
 * and hands out cursors and prepared statements. Also carries the read-only
 * guard, the trace annotations and the shared statement cache.
 */

import { createHash } from "node:crypto";
import type {
  DriverConnection,
  OperationStatus,
} from "../core/ports/driver.port.js";
import { ResultCursor } from "../core/cursor/result-cursor.js";
import type { StatementCursor } from "../core/cursor/statement-cursor.js";
import {
  FetchMode,
  type ColumnSelector,
} from "../core/domain/value-objects/fetch-mode.js";
import type { ParamType, ParamValue } from "../core/domain/value-objects/param-type.js";
import {
  queryLogger,
  type QueryLogger,
} from "../core/domain/services/query-logger.js";
import { assertReadOnlyQuery } from "../core/domain/services/readonly-guard.js";
import {
  TraceAnnotations,
  type AnnotationValue,
} from "../core/domain/services/trace-comment.js";
import {
  InvalidArgumentError,
  SqlError,
  SqlNotConnectedError,
} from "../core/domain/errors/index.js";
import {
  DEFAULT_WAIT_TIMEOUT,
  resolveConnectionInfo,
  resolveOptions,
  type ConnectionInfo,
  type ConnectionOptions,
} from "../config/defaults.js";
import { Mysql2Driver } from "../adapters/mysql/mysql2-driver.js";
import { statementAttributes, withSpan } from "../adapters/telemetry/tracer.js";
import * as pear from "../legacy/pear-compat.js";
import {
  PearFetchMode,
  type PearConnection,
  type PearHost,
} from "../legacy/pear-compat.js";
import { Statement, type StatementContext } from "./statement.js";

export type DriverFactory = (
  info: ConnectionInfo,
  options: ConnectionOptions,
) => DriverConnection;

const defaultDriverFactory: DriverFactory = (info, options) =>
  new Mysql2Driver(info, options);

export class Connection implements PearConnection, PearHost {
  private readonly info: ConnectionInfo;
  private readonly options: ConnectionOptions;
  private driver: DriverConnection | null = null;
  private lastHandle: OperationStatus | null = null;
  private readonly annotations = new TraceAnnotations();
  private readonly statementCache = new Map<string, Promise<Statement>>();
  private defaultFetchMode: FetchMode | null = null;
  private replicationDelay: Promise<number | null> | null = null;
  private realtime: Promise<boolean> | null = null;
  private engines: Promise<Set<string>> | null = null;

  constructor(
    info: Partial<ConnectionInfo> = {},
    options: Partial<ConnectionOptions> = {},
    private readonly driverFactory: DriverFactory = defaultDriverFactory,
    private readonly logger: QueryLogger = queryLogger,
  ) {
    this.info = resolveConnectionInfo(info);
    this.options = resolveOptions(options);
  }

  // ============================================
  // Link management
  // ============================================

  /**
   * Open (or reopen) the server connection
   */
  async connect(): Promise<this> {
    const driver = this.driver ?? this.driverFactory(this.info, this.options);

    // handles prepared on a previous link are gone
    this.statementCache.clear();

    await driver.connect();
    this.driver = driver;

    if (this.options.waitTimeout > 0) {
      await driver.query(`SET wait_timeout=${this.options.waitTimeout}`);
    }

    return this;
  }

  /**
   * Live driver connection. Connects when needed unless autoconnect is off.
   */
  async link(autoconnect = true): Promise<DriverConnection> {
    const current = this.driver;
    if (current && (await current.ping())) {
      return current;
    }

    if (!autoconnect) {
      throw new SqlNotConnectedError();
    }

    await this.connect();
    if (!this.driver) {
      throw new SqlNotConnectedError();
    }
    return this.driver;
  }

  /**
   * False when not connected or when the server does not answer
   */
  async ping(): Promise<boolean> {
    if (!this.driver) return false;
    return this.driver.ping();
  }

  /**
   * Close the link. Resolves to null when there was nothing to close.
   */
  async disconnect(): Promise<true | null> {
    const driver = this.driver;
    if (!driver) return null;

    this.driver = null;
    this.lastHandle = null;
    this.statementCache.clear();
    await driver.close();
    return true;
  }

  async threadId(): Promise<number | null> {
    return (await this.link()).threadId;
  }

  /**
   * Kill a server thread
   */
  async kill(threadId: number): Promise<void> {
    if (!Number.isInteger(threadId) || threadId <= 0) {
      throw new InvalidArgumentError(`Invalid thread id: ${threadId}`);
    }
    await (await this.link()).query(`KILL ${threadId}`);
  }

  /**
   * Server-side idle timeout in seconds; 0 restores the server default
   */
  async setAutoDisconnect(seconds: number): Promise<void> {
    if (!Number.isInteger(seconds) || seconds < 0) {
      throw new InvalidArgumentError(`Invalid timeout: ${seconds}`);
    }
    const timeout = seconds === 0 ? DEFAULT_WAIT_TIMEOUT : seconds;
    await (await this.link()).query(`SET wait_timeout=${timeout}`);
  }

  // ============================================
  // Queries and statements
  // ============================================

  /**
   * Run a query. With parameters it goes through a prepared statement,
   * otherwise it is sent as is. Resolves to a cursor when the query
   * produced a result set, null otherwise.
   *
   * Cached statements carry connection annotations only, so the cache key
   * does not change with every query-level annotation.
   */
  async query(
    query: string,
    params: readonly ParamValue[] = [],
  ): Promise<ResultCursor | null> {
    const cached = params.length > 0 && this.options.queryPrepareCache;
    const sql = this.annotations.inject(query, cached ? "connection" : "all");

    if (this.options.readonly) {
      assertReadOnlyQuery(sql);
    }

    if (cached) {
      const statement = await this.prepareCached(sql);
      return statement.execute(...params);
    }

    if (params.length > 0) {
      // rows are buffered by execute(), the server handle can go
      const statement = await this.prepare(sql);
      try {
        return await statement.execute(...params);
      } finally {
        await statement.close();
      }
    }

    return withSpan("mysql.query", statementAttributes(sql, "query"), async () => {
      const start = performance.now();
      const driver = await this.link();
      const outcome = await driver.query(sql);
      this.lastHandle = driver;

      if (this.options.queryLog) {
        this.logger.log("query", sql, null, performance.now() - start);
      }

      return outcome.kind === "rows" ? new ResultCursor(outcome.result) : null;
    });
  }

  async prepare(query: string, typeHints?: readonly ParamType[]): Promise<Statement> {
    const statement = new Statement(this.statementContext());
    return statement.prepare(query, typeHints);
  }

  /**
   * Shared, frozen statement for this query text. Concurrent first calls
   * wait on the same preparation; a failed preparation is not cached.
   */
  async prepareCached(
    query: string,
    typeHints?: readonly ParamType[],
  ): Promise<Statement> {
    const key = createHash("md5").update(query).digest("hex");

    const cached = this.statementCache.get(key);
    if (cached) return cached;

    const pending = this.prepare(query, typeHints).then(
      (statement) => statement.freeze(),
      (error: unknown) => {
        this.statementCache.delete(key);
        throw error;
      },
    );
    this.statementCache.set(key, pending);
    return pending;
  }

  getInsertId(): number {
    return this.lastHandle?.insertId ?? 0;
  }

  getAffectedRows(): number {
    return this.lastHandle?.affectedRows ?? 0;
  }

  // ============================================
  // Transactions
  // ============================================

  async begin(): Promise<void> {
    await (await this.link()).beginTransaction();
  }

  async commit(): Promise<void> {
    await (await this.link(false)).commit();
  }

  async rollback(): Promise<void> {
    await (await this.link(false)).rollback();
  }

  // ============================================
  // Trace annotations
  // ============================================

  /** Annotate the next query only */
  setExtendedQueryInfo(key: string, value: AnnotationValue | null): this {
    this.annotations.setQueryInfo(key, value);
    return this;
  }

  /** Annotate every query on this connection */
  setExtendedConnectionInfo(key: string, value: AnnotationValue | null): this {
    this.annotations.setConnectionInfo(key, value);
    return this;
  }

  flushExtendedQueryInfo(): this {
    this.annotations.flushQueryInfo();
    return this;
  }

  flushExtendedConnectionInfo(): this {
    this.annotations.flushConnectionInfo();
    return this;
  }

  // ============================================
  // Replication
  // ============================================

  setReadOnly(readonly: boolean): this {
    this.options.readonly = readonly;
    this.replicationDelay = null;
    this.realtime = null;
    return this;
  }

  isReadOnly(): boolean {
    return this.options.readonly;
  }

  /**
   * Seconds the replica lags behind its primary. A writable connection is
   * taken to be the primary. Null when the server reports no delay.
   */
  async getReplicationDelay(): Promise<number | null> {
    if (!this.options.readonly) return 0;

    this.replicationDelay ??= this.probeReplicationDelay().catch((error: unknown) => {
      this.replicationDelay = null;
      throw error;
    });
    return this.replicationDelay;
  }

  /**
   * Whether reads see the primary's data. Computed once; a failed probe
   * counts as not realtime.
   */
  async isRealtime(): Promise<boolean> {
    this.realtime ??= this.probeRealtime().catch((error: unknown) => {
      this.realtime = null;
      throw error;
    });
    return this.realtime;
  }

  /**
   * Whether the server has the storage engine enabled (case-insensitive)
   */
  async hasEngine(name: string): Promise<boolean> {
    this.engines ??= this.loadEngines().catch((error: unknown) => {
      this.engines = null;
      throw error;
    });
    return (await this.engines).has(name.toLowerCase());
  }

  // ============================================
  // PEAR::DB API
  // ============================================

  /**
   * Mode used by the legacy functions when called with PearFetchMode.Default
   */
  setFetchMode(mode: PearFetchMode): void {
    this.defaultFetchMode =
      mode === PearFetchMode.Default ? null : pear.toFetchMode(mode);
  }

  getDefaultFetchMode(): FetchMode | null {
    return this.defaultFetchMode;
  }

  isError(): boolean {
    return false;
  }

  autoCommit(state: boolean): Promise<void> {
    return pear.autoCommit(this, state);
  }

  affectedRows(): number {
    return pear.affectedRows(this);
  }

  execute(
    statement: Statement,
    params?: ParamValue | readonly ParamValue[],
  ): Promise<StatementCursor | null> {
    return pear.execute(statement, params);
  }

  getCol(
    query: string,
    column?: ColumnSelector,
    params?: readonly ParamValue[],
  ): Promise<unknown[]> {
    return pear.getCol(this, query, column, params);
  }

  getOne(query: string, params?: readonly ParamValue[]): Promise<unknown> {
    return pear.getOne(this, query, params);
  }

  getRow(
    query: string,
    params?: readonly ParamValue[],
    fetchMode?: PearFetchMode,
  ): Promise<unknown> {
    return pear.getRow(this, query, params, fetchMode);
  }

  getAll(
    query: string,
    params?: readonly ParamValue[],
    fetchMode?: PearFetchMode,
  ): Promise<unknown[]> {
    return pear.getAll(this, query, params, fetchMode);
  }

  getAssoc(
    query: string,
    forceArray?: boolean,
    params?: readonly ParamValue[],
    fetchMode?: PearFetchMode,
    group?: boolean,
  ): Promise<Record<string, unknown>> {
    return pear.getAssoc(this, query, forceArray, params, fetchMode, group);
  }

  // ============================================
  // Internals
  // ============================================

  private statementContext(): StatementContext {
    return {
      link: () => this.link(),
      logger: this.logger,
      queryLog: this.options.queryLog,
      onExecuted: (status) => {
        this.lastHandle = status;
      },
    };
  }

  private async probeRealtime(): Promise<boolean> {
    try {
      return (await this.getReplicationDelay()) === 0;
    } catch (error) {
      if (error instanceof SqlError) {
        console.warn(`[Connection] Replication probe failed: ${error.message}`);
        return false;
      }
      throw error;
    }
  }

  private async probeReplicationDelay(): Promise<number | null> {
    const outcome = await (await this.link()).query("SHOW SLAVE STATUS");
    if (outcome.kind !== "rows") return null;

    const row = new ResultCursor(outcome.result).next(FetchMode.Assoc);
    const delay = row?.["Seconds_Behind_Master"];
    if (delay === null || delay === undefined) return null;

    const seconds = Number(delay);
    return Number.isNaN(seconds) ? null : seconds;
  }

  private async loadEngines(): Promise<Set<string>> {
    const engines = new Set<string>();
    const outcome = await (await this.link()).query("SHOW ENGINES");
    if (outcome.kind !== "rows") return engines;

    const cursor = new ResultCursor(outcome.result);
    let row: unknown[] | null;
    while ((row = cursor.next(FetchMode.Ordered)) !== null) {
      const support = String(row[1] ?? "").toUpperCase();
      if (support === "YES" || support === "DEFAULT") {
        engines.add(String(row[0]).toLowerCase());
      }
    }
    return engines;
  }
}
