/**
 * Query Logger
 *
 * Process-wide, append-only log of executed commands with their duration and
 * the call path that issued them.
 */

import { fileURLToPath } from "node:url";
import type { ParamValue } from "../value-objects/param-type.js";
import { substitutePlaceholders } from "../value-objects/placeholders.js";

export type LogCommand = "query" | "prepare" | "execute";

export interface QueryLogEntry {
  readonly command: LogCommand;
  /** Query text with markers resolved for display */
  readonly query: string;
  /** Milliseconds */
  readonly duration: number;
  /** "file:line" frames, outermost caller first */
  readonly callPath: readonly string[];
}

export interface QueryLogStats {
  totalTime: number;
  /** Every command except "prepare" */
  totalQueries: number;
  maxTime: number;
}

// src/ of this library; frames under it are not reported in call paths
const LIBRARY_ROOT = fileURLToPath(new URL("../../../", import.meta.url));

export class QueryLogger {
  private entries: QueryLogEntry[] = [];

  log(
    command: LogCommand,
    query: string,
    params: readonly ParamValue[] | null,
    duration: number,
  ): QueryLogEntry {
    const resolved = params
      ? substitutePlaceholders(query, params.map(renderParam))
      : query;

    const entry: QueryLogEntry = Object.freeze({
      command,
      query: resolved,
      duration,
      callPath: Object.freeze(captureCallPath()),
    });

    console.log(`[QueryLog] ${command} ${resolved}`);
    this.entries.push(entry);
    return entry;
  }

  /**
   * Logged entries, slowest first when sortByDuration is set
   */
  getLogs(sortByDuration = false): QueryLogEntry[] {
    const logs = [...this.entries];
    if (sortByDuration) {
      logs.sort((a, b) => b.duration - a.duration);
    }
    return logs;
  }

  getGlobalStats(): QueryLogStats {
    const stats: QueryLogStats = { totalTime: 0, totalQueries: 0, maxTime: 0 };

    for (const entry of this.entries) {
      if (entry.command !== "prepare") stats.totalQueries++;
      stats.totalTime += entry.duration;
      stats.maxTime = Math.max(stats.maxTime, entry.duration);
    }

    return stats;
  }

  clear(): void {
    this.entries = [];
  }

  get size(): number {
    return this.entries.length;
  }
}

/**
 * Shared logger used by connections and statements
 */
export const queryLogger = new QueryLogger();

/**
 * Render a parameter the way it would read in SQL
 */
export function renderParam(value: ParamValue): string {
  if (value === null) return "NULL";
  if (typeof value === "boolean") return value ? "1" : "0";
  if (typeof value === "number" || typeof value === "bigint") {
    return value.toString();
  }
  if (value instanceof Date) return `'${value.toISOString()}'`;
  if (Buffer.isBuffer(value)) return `X'${value.toString("hex")}'`;
  return `'${value.replace(/'/g, "''")}'`;
}

const FRAME_PATTERN = /^\s*at (?:.*? \()?(.+?):(\d+):\d+\)?$/;

function captureCallPath(): string[] {
  const stack = new Error().stack ?? "";
  const frames: string[] = [];

  for (const line of stack.split("\n").slice(1)) {
    const match = FRAME_PATTERN.exec(line);
    if (!match?.[1] || !match[2]) continue;

    const file = toPath(match[1]);
    if (file.startsWith("node:") || file.startsWith(LIBRARY_ROOT)) continue;
    frames.push(`${file}:${match[2]}`);
  }

  return frames.reverse();
}

function toPath(location: string): string {
  return location.startsWith("file://") ? fileURLToPath(location) : location;
}
