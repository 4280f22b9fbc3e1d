/**
 * Connection configuration types and defaults
 */

export interface ConnectionInfo {
  /** Host name or IP; null means localhost */
  hostname: string | null;
  username: string | null;
  password: string | null;
  /** Default database */
  database: string | null;
  port: number | null;
  /** Unix socket path, used instead of TCP when set */
  socket: string | null;
}

export interface ConnectionOptions {
  /** Use the compression protocol */
  compression: boolean;
  /** Use TLS */
  ssl: boolean;
  /** Report matched rows rather than changed rows */
  foundRows: boolean;
  /** Allow spaces after function names */
  ignoreSpace: boolean;
  /** Reject write statements (see setReadOnly()) */
  readonly: boolean;
  /** Record every command in the query logger */
  queryLog: boolean;
  /** Let query() share cached statements instead of preparing each time */
  queryPrepareCache: boolean;
  /** Seconds, 0 for the driver default */
  connectTimeout: number;
  /** Server-side idle timeout in seconds, 0 to keep the server's */
  waitTimeout: number;
  /** Use interactive_timeout instead of wait_timeout on the server */
  clientInteractive: boolean;
}

export const DEFAULT_CONNECTION_INFO: ConnectionInfo = {
  hostname: null,
  username: null,
  password: null,
  database: null,
  port: null,
  socket: null,
};

export const DEFAULT_OPTIONS: ConnectionOptions = {
  compression: false,
  ssl: false,
  foundRows: false,
  ignoreSpace: false,
  readonly: false,
  queryLog: false,
  queryPrepareCache: false,
  connectTimeout: 0,
  waitTimeout: 0,
  clientInteractive: false,
};

/** Server default for wait_timeout, in seconds */
export const DEFAULT_WAIT_TIMEOUT = 28800;

export function resolveConnectionInfo(
  info: Partial<ConnectionInfo> = {},
): ConnectionInfo {
  return { ...DEFAULT_CONNECTION_INFO, ...info };
}

export function resolveOptions(
  options: Partial<ConnectionOptions> = {},
): ConnectionOptions {
  return { ...DEFAULT_OPTIONS, ...options };
}
