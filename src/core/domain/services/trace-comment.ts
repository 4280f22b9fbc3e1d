/**
 * Trace comments
 *
 * Key/value annotations appended to outgoing SQL as a trailing comment, so
 * DBAs can tell where a query comes from (URI, request id, timeout hints).
 * Connection-level annotations persist; query-level ones are consumed by the
 * next query.
 */

export type AnnotationValue = string | number | boolean;

export type AnnotationScope = "all" | "connection";

export class TraceAnnotations {
  private readonly connectionInfo = new Map<string, AnnotationValue>();
  private queryInfo = new Map<string, AnnotationValue>();

  /** null removes the key */
  setQueryInfo(key: string, value: AnnotationValue | null): void {
    if (value === null) this.queryInfo.delete(key);
    else this.queryInfo.set(key, value);
  }

  /** null removes the key */
  setConnectionInfo(key: string, value: AnnotationValue | null): void {
    if (value === null) this.connectionInfo.delete(key);
    else this.connectionInfo.set(key, value);
  }

  flushQueryInfo(): void {
    this.queryInfo.clear();
  }

  flushConnectionInfo(): void {
    this.connectionInfo.clear();
  }

  /**
   * Append the comment to query and drop query-level annotations.
   * Query-level values win over connection-level ones with the same key.
   * With scope "connection" only connection-level values are written.
   */
  inject(query: string, scope: AnnotationScope = "all"): string {
    const merged = new Map<string, AnnotationValue>(
      scope === "all" ? [...this.connectionInfo, ...this.queryInfo] : this.connectionInfo,
    );
    this.queryInfo = new Map();

    if (merged.size === 0) return query;

    const text = [...merged]
      .map(([key, value]) => `${key}:${String(value)}`)
      .join(", ");

    return `${query} /* ${escapeComment(text)} */`;
  }
}

/**
 * Neutralize every comment terminator so the text cannot close the comment
 */
export function escapeComment(text: string): string {
  return text.replace(/\*\//g, "*\\/");
}
