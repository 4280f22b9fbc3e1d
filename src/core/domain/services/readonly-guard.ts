/**
 * Read-only guard
 *
 * Rejects write statements on read-only connections. Tables prefixed with
 * norepli_ are not replicated and stay writable, as do temporary tables.
 */

import { SqlReadOnlyError } from "../errors/index.js";

const WRITE_VERB = /^\s*(insert|delete|update|replace|create)\s/i;
const UNREPLICATED_TABLE =
  /^\s*(insert|delete|update|replace|create)\s+(?:(?:from|into|table)\s+)?`?norepli_\w+/i;
const TEMPORARY_TABLE = /^\s*create\s+temporary\s+/i;

export function isWriteQuery(query: string): boolean {
  return WRITE_VERB.test(query);
}

/**
 * Throws SqlReadOnlyError for a write that is not allowed on a read-only link
 */
export function assertReadOnlyQuery(query: string): void {
  if (!isWriteQuery(query)) return;
  if (UNREPLICATED_TABLE.test(query)) return;
  if (TEMPORARY_TABLE.test(query)) return;

  throw new SqlReadOnlyError(query);
}
