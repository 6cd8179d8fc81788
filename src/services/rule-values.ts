export type ScalarValue = string | number | boolean;

export type ListItem = ScalarValue | null;

/**
 * Comparison value of a scoring rule, decided once when the rule is loaded.
 */
export type RuleValue =
  | { kind: "string"; value: string }
  | { kind: "number"; value: number }
  | { kind: "boolean"; value: boolean }
  | { kind: "null" }
  | { kind: "list"; value: ListItem[] };

function isListItem(item: unknown): item is ListItem {
  return (
    item === null ||
    typeof item === "string" ||
    typeof item === "number" ||
    typeof item === "boolean"
  );
}

/**
 * Parse the stored JSON text of a rule value.
 * Text that is not JSON, or JSON that is neither a scalar nor a flat list,
 * is kept as a raw string.
 */
export function parseRuleValue(raw: string): RuleValue {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return { kind: "string", value: raw };
  }

  if (parsed === null) return { kind: "null" };
  if (typeof parsed === "string") return { kind: "string", value: parsed };
  if (typeof parsed === "number") return { kind: "number", value: parsed };
  if (typeof parsed === "boolean") return { kind: "boolean", value: parsed };
  if (Array.isArray(parsed) && parsed.every(isListItem)) {
    return { kind: "list", value: parsed };
  }

  return { kind: "string", value: raw };
}

export function serializeRuleValue(value: ListItem | ListItem[]): string {
  return JSON.stringify(value);
}
