import neo4j, { Integer, Node, Path, Relationship } from "neo4j-driver";

/**
 * Converts driver values into JSON-friendly values: integers become numbers,
 * nodes and relationships become their properties.
 */
export function toPlainValue(value: unknown): unknown {
  if (value === null || value === undefined) {
    return null;
  }
  if (value instanceof Integer) {
    return value.inSafeRange() ? value.toNumber() : value.toString();
  }
  if (Array.isArray(value)) {
    return value.map((item) => toPlainValue(item));
  }
  if (value instanceof Node) {
    return {
      labels: [...value.labels],
      ...toPlainRecord(value.properties)
    };
  }
  if (value instanceof Relationship) {
    return {
      type: value.type,
      ...toPlainRecord(value.properties)
    };
  }
  if (value instanceof Path) {
    return {
      start: toPlainValue(value.start),
      end: toPlainValue(value.end),
      length: value.length
    };
  }
  if (typeof value === "object") {
    if (isTemporal(value)) {
      return value.toString();
    }
    return toPlainRecord(value);
  }
  return value;
}

export function toPlainRecord(value: object): Record<string, unknown> {
  const record: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    record[key] = toPlainValue(entry);
  }
  return record;
}

function isTemporal(value: object): boolean {
  return (
    neo4j.isDate(value) ||
    neo4j.isDateTime(value) ||
    neo4j.isLocalDateTime(value) ||
    neo4j.isTime(value) ||
    neo4j.isLocalTime(value) ||
    neo4j.isDuration(value)
  );
}

export function toNumber(value: unknown, fallback = 0): number {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : fallback;
  }
  if (value instanceof Integer) {
    return value.toNumber();
  }
  return fallback;
}
