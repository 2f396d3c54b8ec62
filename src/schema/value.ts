// src/schema/value.ts
// Decoded form of a parsed configuration document

export type Scalar = string | number | boolean | null;

export interface MapValue {
  readonly tag: "Map";
  readonly entries: ReadonlyMap<string, ConfigValue>;
}

export interface ListValue {
  readonly tag: "List";
  readonly items: readonly ConfigValue[];
}

export interface ScalarValue {
  readonly tag: "Scalar";
  readonly value: Scalar;
}

export type ConfigValue = MapValue | ListValue | ScalarValue;

/**
 * Decode a value produced by a JSON/YAML style parser.
 * Plain objects keep their key order; anything that is neither an object nor
 * an array ends up as a scalar.
 */
export function decodeValue(raw: unknown): ConfigValue {
  if (Array.isArray(raw)) {
    return { tag: "List", items: raw.map(decodeValue) };
  }
  if (raw instanceof Date) {
    return scalar(raw.toISOString());
  }
  if (typeof raw === "object" && raw !== null) {
    const entries = new Map<string, ConfigValue>();
    for (const [key, value] of Object.entries(raw)) {
      entries.set(key, decodeValue(value));
    }
    return { tag: "Map", entries };
  }
  switch (typeof raw) {
    case "string":
    case "number":
    case "boolean":
      return scalar(raw);
    case "undefined":
      return scalar(null);
    case "bigint":
      return scalar(raw.toString());
    default:
      return scalar(raw === null ? null : String(raw));
  }
}

export function scalar(value: Scalar): ScalarValue {
  return { tag: "Scalar", value };
}

export function isMap(v: ConfigValue | undefined): v is MapValue {
  return v?.tag === "Map";
}

export function isList(v: ConfigValue | undefined): v is ListValue {
  return v?.tag === "List";
}

/** Keys of a map; every other value has none. */
export function keysOf(v: ConfigValue | undefined): string[] {
  return isMap(v) ? Array.from(v.entries.keys()) : [];
}

export function toPlain(v: ConfigValue): unknown {
  switch (v.tag) {
    case "Scalar":
      return v.value;
    case "List":
      return v.items.map(toPlain);
    case "Map": {
      const out: Record<string, unknown> = {};
      for (const [key, value] of v.entries) {
        out[key] = toPlain(value);
      }
      return out;
    }
  }
}

/**
 * Render a value for a log line: strings verbatim, other scalars via String,
 * lists and maps as JSON.
 */
export function formatValue(v: ConfigValue): string {
  if (v.tag === "Scalar") {
    return typeof v.value === "string" ? v.value : String(v.value);
  }
  return JSON.stringify(toPlain(v));
}
