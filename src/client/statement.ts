/**
 * Prepared Statement
 *
 * Owns one driver statement handle and, once executed with a result set, one
 * StatementCursor that every later execution resets and hands back.
 */

import type {
  DriverConnection,
  DriverStatement,
  OperationStatus,
} from "../core/ports/driver.port.js";
import { StatementCursor } from "../core/cursor/statement-cursor.js";
import {
  coerceParam,
  inferParamTypes,
  type ParamType,
  type ParamValue,
} from "../core/domain/value-objects/param-type.js";
import { countPlaceholders } from "../core/domain/value-objects/placeholders.js";
import { ExclusiveLock } from "../core/domain/value-objects/exclusive-lock.js";
import type { QueryLogger } from "../core/domain/services/query-logger.js";
import {
  FrozenStatementError,
  SqlMismatchError,
  SqlNotPreparedError,
  SqlTypeMismatchError,
} from "../core/domain/errors/index.js";
import { statementAttributes, withSpan } from "../adapters/telemetry/tracer.js";

export interface StatementContext {
  /** Live driver connection, connecting when needed */
  link(): Promise<DriverConnection>;
  logger: QueryLogger;
  queryLog: boolean;
  /** Called after every successful execute */
  onExecuted?: (status: OperationStatus) => void;
}

export class Statement {
  private handle: DriverStatement | null = null;
  private query: string | null = null;
  private placeholderCount = 0;
  private paramTypes: ParamType[] | null = null;
  private frozen = false;
  private cursor: StatementCursor | null = null;
  private readonly lock = new ExclusiveLock();

  constructor(private readonly context: StatementContext) {}

  /**
   * Prepare a query for execution. Placeholders are `?` markers at value
   * positions. Without type hints, types are taken from the first execute().
   */
  async prepare(query: string, typeHints?: readonly ParamType[]): Promise<this> {
    if (this.frozen) {
      throw new FrozenStatementError(query);
    }

    const placeholderCount = countPlaceholders(query);
    if (typeHints && typeHints.length !== placeholderCount) {
      throw new SqlTypeMismatchError(placeholderCount, typeHints.length);
    }

    const start = performance.now();
    const driver = await this.context.link();
    const handle = await driver.prepare(query);

    const previous = this.handle;
    this.handle = handle;
    this.query = query;
    this.placeholderCount = placeholderCount;
    this.paramTypes = typeHints ? [...typeHints] : null;
    this.cursor = null;

    if (previous) {
      await previous.close();
    }

    if (this.context.queryLog) {
      this.context.logger.log("prepare", query, null, performance.now() - start);
    }

    return this;
  }

  /**
   * Execute with one value per placeholder.
   * Resolves to the statement's cursor when a result set was produced.
   */
  async execute(...params: ParamValue[]): Promise<StatementCursor | null> {
    const handle = this.handle;
    const query = this.query;
    if (!handle || query === null) {
      throw new SqlNotPreparedError("Cannot execute a statement that was not prepared.");
    }

    if (params.length !== this.placeholderCount) {
      throw new SqlMismatchError(this.placeholderCount, params.length);
    }

    return this.lock.run(() =>
      withSpan("mysql.execute", statementAttributes(query, "execute"), async () => {
        const start = performance.now();

        // fixed by the first execution when no hints were given
        const types = (this.paramTypes ??= inferParamTypes(params));
        const values = params.map((value, index) => coerceParam(value, types[index] ?? "string"));

        await handle.execute(values);
        this.context.onExecuted?.(handle);

        if (this.context.queryLog) {
          this.context.logger.log("execute", query, params, performance.now() - start);
        }

        if (handle.fieldCount === 0) {
          return null;
        }

        if (this.cursor) {
          return this.cursor.reset();
        }

        this.cursor = new StatementCursor(handle);
        return this.cursor;
      }),
    );
  }

  /**
   * Lock the query text so the statement can be shared from a cache
   */
  freeze(): this {
    this.frozen = true;
    return this;
  }

  isFrozen(): boolean {
    return this.frozen;
  }

  /**
   * Rows changed by the last execute (0 before any)
   */
  getAffectedRows(): number {
    return this.handle?.affectedRows ?? 0;
  }

  getInsertId(): number {
    return this.handle?.insertId ?? 0;
  }

  getQuery(): string | null {
    return this.query;
  }

  getParamTypes(): readonly ParamType[] | null {
    return this.paramTypes;
  }

  async close(): Promise<void> {
    const handle = this.handle;
    this.handle = null;
    this.cursor = null;
    if (handle) {
      await handle.close();
    }
  }
}
