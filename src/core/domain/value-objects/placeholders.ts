/**
 * Placeholder markers
 *
 * A marker is a `?` outside string literals, quoted identifiers and
 * comments. Whether a marker sits at a legal position is left to the server.
 */

type ScanState = "code" | "single" | "double" | "backtick" | "line" | "block";

/**
 * Offsets of every placeholder marker in the query
 */
export function findPlaceholders(query: string): number[] {
  const offsets: number[] = [];
  let state: ScanState = "code";

  for (let i = 0; i < query.length; i++) {
    const ch = query[i];
    const next = query[i + 1];

    switch (state) {
      case "code":
        if (ch === "?") offsets.push(i);
        else if (ch === "'") state = "single";
        else if (ch === '"') state = "double";
        else if (ch === "`") state = "backtick";
        else if (ch === "#") state = "line";
        else if (ch === "-" && next === "-" && isLineCommentStart(query[i + 2])) {
          state = "line";
          i++;
        } else if (ch === "/" && next === "*") {
          state = "block";
          i++;
        }
        break;

      case "single":
      case "double":
        if (ch === "\\") i++;
        else if (ch === (state === "single" ? "'" : '"')) {
          // doubled quote stays inside the literal
          if (next === ch) i++;
          else state = "code";
        }
        break;

      case "backtick":
        if (ch === "`") {
          if (next === "`") i++;
          else state = "code";
        }
        break;

      case "line":
        if (ch === "\n") state = "code";
        break;

      case "block":
        if (ch === "*" && next === "/") {
          state = "code";
          i++;
        }
        break;
    }
  }

  return offsets;
}

export function countPlaceholders(query: string): number {
  return findPlaceholders(query).length;
}

/**
 * Replace markers with rendered values, in order. Markers beyond the given
 * values are kept.
 */
export function substitutePlaceholders(
  query: string,
  values: readonly string[],
): string {
  const offsets = findPlaceholders(query);
  let out = "";
  let last = 0;

  offsets.forEach((offset, index) => {
    if (index >= values.length) return;
    out += query.slice(last, offset) + values[index];
    last = offset + 1;
  });

  return out + query.slice(last);
}

// MySQL only treats "--" as a comment when followed by whitespace or EOF
function isLineCommentStart(ch: string | undefined): boolean {
  return ch === undefined || /\s/.test(ch);
}
