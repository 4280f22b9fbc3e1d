/**
 * Errors
 *
 * Library errors derive from DbdError. Everything reported by (or about) the
 * server is a SqlError carrying the driver error code and SQLSTATE.
 */

export class DbdError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DbdError";
  }
}

export class SqlError extends DbdError {
  readonly code: number | null;
  readonly sqlState: string | null;

  constructor(
    message: string,
    code: number | null = null,
    sqlState: string | null = null,
  ) {
    super(message);
    this.name = "SqlError";
    this.code = code;
    this.sqlState = sqlState;
  }
}

// ============================================
// Server-side errors (mapped from driver codes)
// ============================================

export class SqlSyntaxError extends SqlError {
  constructor(message: string, code: number | null = null, sqlState: string | null = null) {
    super(message, code, sqlState);
    this.name = "SqlSyntaxError";
  }
}

export class SqlConstraintError extends SqlError {
  constructor(message: string, code: number | null = null, sqlState: string | null = null) {
    super(message, code, sqlState);
    this.name = "SqlConstraintError";
  }
}

export class SqlNotFoundError extends SqlError {
  constructor(message: string, code: number | null = null, sqlState: string | null = null) {
    super(message, code, sqlState);
    this.name = "SqlNotFoundError";
  }
}

export class SqlAlreadyExistsError extends SqlError {
  constructor(message: string, code: number | null = null, sqlState: string | null = null) {
    super(message, code, sqlState);
    this.name = "SqlAlreadyExistsError";
  }
}

export class SqlDivZeroError extends SqlError {
  constructor(message: string, code: number | null = null, sqlState: string | null = null) {
    super(message, code, sqlState);
    this.name = "SqlDivZeroError";
  }
}

export class SqlNoDbSelectedError extends SqlError {
  constructor(message: string, code: number | null = null, sqlState: string | null = null) {
    super(message, code, sqlState);
    this.name = "SqlNoDbSelectedError";
  }
}

export class SqlCannotCreateError extends SqlError {
  constructor(message: string, code: number | null = null, sqlState: string | null = null) {
    super(message, code, sqlState);
    this.name = "SqlCannotCreateError";
  }
}

export class SqlCannotDropError extends SqlError {
  constructor(message: string, code: number | null = null, sqlState: string | null = null) {
    super(message, code, sqlState);
    this.name = "SqlCannotDropError";
  }
}

export class SqlNoSuchTableError extends SqlError {
  constructor(message: string, code: number | null = null, sqlState: string | null = null) {
    super(message, code, sqlState);
    this.name = "SqlNoSuchTableError";
  }
}

export class SqlNoSuchFieldError extends SqlError {
  constructor(message: string, code: number | null = null, sqlState: string | null = null) {
    super(message, code, sqlState);
    this.name = "SqlNoSuchFieldError";
  }
}

export class SqlNoSuchDbError extends SqlError {
  constructor(message: string, code: number | null = null, sqlState: string | null = null) {
    super(message, code, sqlState);
    this.name = "SqlNoSuchDbError";
  }
}

export class SqlNotLockedError extends SqlError {
  constructor(message: string, code: number | null = null, sqlState: string | null = null) {
    super(message, code, sqlState);
    this.name = "SqlNotLockedError";
  }
}

export class SqlValueCountOnRowError extends SqlError {
  constructor(message: string, code: number | null = null, sqlState: string | null = null) {
    super(message, code, sqlState);
    this.name = "SqlValueCountOnRowError";
  }
}

export class SqlAccessViolationError extends SqlError {
  constructor(message: string, code: number | null = null, sqlState: string | null = null) {
    super(message, code, sqlState);
    this.name = "SqlAccessViolationError";
  }
}

export class SqlNotPreparedError extends SqlError {
  constructor(message: string, code: number | null = null, sqlState: string | null = null) {
    super(message, code, sqlState);
    this.name = "SqlNotPreparedError";
  }
}

// ============================================
// Client-side errors
// ============================================

export class SqlConnectFailedError extends SqlError {
  constructor(message: string, code: number | null = null, sqlState: string | null = null) {
    super(message, code, sqlState);
    this.name = "SqlConnectFailedError";
  }
}

export class SqlNotConnectedError extends SqlError {
  constructor(message = "Not connected to the database") {
    super(message);
    this.name = "SqlNotConnectedError";
  }
}

export class SqlReadOnlyError extends SqlError {
  constructor(query: string) {
    super(`Can't send write queries on a read-only connection: ${query}`);
    this.name = "SqlReadOnlyError";
  }
}

export class SqlMismatchError extends SqlError {
  constructor(expected: number, given: number) {
    super(
      `Wrong parameter count for prepared statement: ${expected} expected, ${given} given.`,
    );
    this.name = "SqlMismatchError";
  }
}

export class SqlTypeMismatchError extends SqlError {
  constructor(expected: number, given: number) {
    super(
      `Wrong type count for prepared statement: ${expected} placeholders, ${given} types given.`,
    );
    this.name = "SqlTypeMismatchError";
  }
}

export class SqlTruncatedError extends SqlError {
  constructor(fieldCount: number) {
    super(`Result has ${fieldCount} field(s), at least 2 are required`);
    this.name = "SqlTruncatedError";
  }
}

export class SqlUnsupportedError extends SqlError {
  constructor(message: string) {
    super(message);
    this.name = "SqlUnsupportedError";
  }
}

export class FrozenStatementError extends DbdError {
  constructor(query: string) {
    super(`Cannot prepare a frozen statement: ${query}`);
    this.name = "FrozenStatementError";
  }
}

export class OutOfRangeError extends DbdError {
  constructor(message: string) {
    super(message);
    this.name = "OutOfRangeError";
  }
}

export class InvalidArgumentError extends DbdError {
  constructor(message: string) {
    super(message);
    this.name = "InvalidArgumentError";
  }
}

// ============================================
// Driver code mapping
// ============================================

type SqlErrorClass = new (
  message: string,
  code: number | null,
  sqlState: string | null,
) => SqlError;

const ERROR_MAP: ReadonlyMap<number, SqlErrorClass> = new Map<number, SqlErrorClass>([
  [1004, SqlCannotCreateError],
  [1005, SqlCannotCreateError],
  [1006, SqlCannotCreateError],
  [1007, SqlAlreadyExistsError],
  [1008, SqlCannotDropError],
  [1022, SqlAlreadyExistsError],
  [1044, SqlAccessViolationError],
  [1046, SqlNoDbSelectedError],
  [1048, SqlConstraintError],
  [1049, SqlNoSuchDbError],
  [1050, SqlAlreadyExistsError],
  [1051, SqlNoSuchTableError],
  [1054, SqlNoSuchFieldError],
  [1061, SqlAlreadyExistsError],
  [1062, SqlAlreadyExistsError],
  [1064, SqlSyntaxError],
  [1091, SqlNotFoundError],
  [1100, SqlNotLockedError],
  [1136, SqlValueCountOnRowError],
  [1142, SqlAccessViolationError],
  [1146, SqlNoSuchTableError],
  [1205, SqlNotLockedError],
  [1216, SqlConstraintError],
  [1217, SqlConstraintError],
  [1365, SqlDivZeroError],
  [1451, SqlConstraintError],
  [1452, SqlConstraintError],
  [2030, SqlNotPreparedError],
]);

/**
 * Build the error matching a driver error code.
 * Unmapped codes give a plain SqlError.
 */
export function errorFromCode(
  code: number,
  message: string,
  sqlState: string | null = null,
): SqlError {
  const ErrorClass = ERROR_MAP.get(code) ?? SqlError;
  return new ErrorClass(message, code, sqlState);
}
