/**
 * Parameter Type Value Object
 *
 * Wire type tag of a prepared statement parameter.
 */

export type ParamType = "string" | "integer" | "double";

export type ParamValue =
  | string
  | number
  | bigint
  | boolean
  | Date
  | Buffer
  | null;

/**
 * Infer the wire type of a parameter from its runtime value
 */
export function inferParamType(value: ParamValue): ParamType {
  if (typeof value === "bigint") return "integer";
  if (typeof value === "number") {
    return Number.isInteger(value) ? "integer" : "double";
  }
  return "string";
}

export function inferParamTypes(values: readonly ParamValue[]): ParamType[] {
  return values.map(inferParamType);
}

/**
 * Coerce a value to the representation of a fixed type tag.
 * NULL always binds as NULL.
 */
export function coerceParam(value: ParamValue, type: ParamType): ParamValue {
  if (value === null) return null;

  switch (type) {
    case "integer":
      return toInteger(value);
    case "double":
      return toDouble(value);
    case "string":
      if (value instanceof Date || Buffer.isBuffer(value)) return value;
      if (typeof value === "boolean") return value ? "1" : "0";
      return String(value);
  }
}

function toInteger(value: Exclude<ParamValue, null>): number | bigint {
  if (typeof value === "bigint") return value;
  if (typeof value === "boolean") return value ? 1 : 0;
  if (typeof value === "number") {
    return Number.isFinite(value) ? Math.trunc(value) : 0;
  }
  if (value instanceof Date) return Math.trunc(value.getTime() / 1000);

  // Leading integer prefix, 0 when there is none
  const match = /^\s*([+-]?\d+)/.exec(value.toString());
  if (!match?.[1]) return 0;
  const parsed = BigInt(match[1]);
  return parsed >= BigInt(Number.MIN_SAFE_INTEGER) &&
    parsed <= BigInt(Number.MAX_SAFE_INTEGER)
    ? Number(parsed)
    : parsed;
}

function toDouble(value: Exclude<ParamValue, null>): number {
  if (typeof value === "bigint") return Number(value);
  if (typeof value === "boolean") return value ? 1 : 0;
  if (typeof value === "number") return value;
  if (value instanceof Date) return value.getTime() / 1000;

  const parsed = Number.parseFloat(value.toString());
  return Number.isNaN(parsed) ? 0 : parsed;
}
