import type { EntityFields, FieldValue, FilterExpression } from "./types.js";

// ── Filter expressions ───────────────────────────────────

export function eq(field: string, value: FieldValue): FilterExpression[number] {
  return { field, op: "==", value };
}

/** `memory_id > 0 and session_id == "abc"` */
export function renderFilter(filter: FilterExpression): string {
  return filter
    .map(({ field, op, value }) =>
      typeof value === "string"
        ? `${field} ${op} ${JSON.stringify(value)}`
        : `${field} ${op} ${value}`,
    )
    .join(" and ");
}

/** Evaluate a filter against a row. Missing fields never match. */
export function matchesFilter(
  row: EntityFields,
  filter: FilterExpression,
): boolean {
  return filter.every(({ field, op, value }) => {
    const actual = row[field];
    if (actual === undefined) return false;
    if (op === "==") return actual === value;
    if (op === "!=") return actual !== value;

    const cmp = compare(actual, value);
    if (cmp === null) return false;
    switch (op) {
      case ">":
        return cmp > 0;
      case ">=":
        return cmp >= 0;
      case "<":
        return cmp < 0;
      case "<=":
        return cmp <= 0;
    }
  });
}

function compare(a: FieldValue, b: FieldValue): number | null {
  if (typeof a === "number" && typeof b === "number") return a - b;
  if (typeof a === "string" && typeof b === "string") {
    return a < b ? -1 : a > b ? 1 : 0;
  }
  return null;
}
