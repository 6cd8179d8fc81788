import { z } from "zod";
import { createChildLogger } from "../config/logger.js";
import type { Lead } from "../db/schemas/types.js";
import type { ScoringRuleRecord } from "../db/scoring-store.js";
import {
  resolveLeadField,
  type FieldAccessor,
  type FieldValue,
} from "./lead-fields.js";
import { parseRuleValue, type RuleValue } from "./rule-values.js";

const log = createChildLogger("service:rule-evaluator");

export const ruleOperatorSchema = z.enum([
  "eq",
  "gt",
  "gte",
  "lt",
  "lte",
  "contains",
  "in",
  "not_in",
  "is_null",
  "is_not_null",
  "regex",
]);

export type RuleOperator = z.infer<typeof ruleOperatorSchema>;

export interface CompiledRule {
  id: string;
  criteriaId: string;
  fieldName: string;
  // Undefined when the field or operator is not recognised; scores 0
  accessor: FieldAccessor | undefined;
  operator: RuleOperator | undefined;
  value: RuleValue;
  points: number;
  description: string;
  isActive: boolean;
  sortOrder: number;
}

export interface CompiledRuleResult {
  rule: CompiledRule;
  issues: string[];
}

/**
 * Turn a stored rule into its evaluable form, reporting configuration
 * problems (unknown field, unknown operator) up front.
 */
export function compileRule(record: ScoringRuleRecord): CompiledRuleResult {
  const issues: string[] = [];

  const accessor = resolveLeadField(record.field_name);
  if (!accessor) {
    issues.push(`Rule ${record.id}: unknown lead field "${record.field_name}"`);
  }

  const operator = ruleOperatorSchema.safeParse(record.operator);
  if (!operator.success) {
    issues.push(`Rule ${record.id}: unknown operator "${record.operator}"`);
  }

  return {
    rule: {
      id: record.id,
      criteriaId: record.criteria_id,
      fieldName: record.field_name,
      accessor,
      operator: operator.success ? operator.data : undefined,
      value: parseRuleValue(record.value),
      points: record.points,
      description: record.description,
      isActive: record.is_active,
      sortOrder: record.sort_order,
    },
    issues,
  };
}

function isEmpty(value: FieldValue): boolean {
  return value === null || value === "";
}

function scalarEquals(field: FieldValue, value: RuleValue): boolean {
  switch (value.kind) {
    case "null":
      return field === null;
    case "list":
      return false;
    default:
      return field === value.value;
  }
}

/**
 * Ordered comparison between two numbers or two strings.
 * Returns undefined when the operands are not comparable.
 */
function compare(field: FieldValue, value: RuleValue): number | undefined {
  if (typeof field === "number" && value.kind === "number") {
    return field - value.value;
  }
  if (typeof field === "string" && value.kind === "string") {
    if (field === value.value) return 0;
    return field < value.value ? -1 : 1;
  }
  return undefined;
}

function matches(
  operator: RuleOperator,
  field: FieldValue,
  value: RuleValue
): boolean {
  switch (operator) {
    case "eq":
      return scalarEquals(field, value);
    case "gt":
    case "gte":
    case "lt":
    case "lte": {
      if (field === null) return false;
      const diff = compare(field, value);
      if (diff === undefined) return false;
      if (operator === "gt") return diff > 0;
      if (operator === "gte") return diff >= 0;
      if (operator === "lt") return diff < 0;
      return diff <= 0;
    }
    case "contains":
      return (
        field !== null &&
        value.kind === "string" &&
        String(field).includes(value.value)
      );
    case "in":
      return value.kind === "list" && value.value.includes(field);
    case "not_in":
      return value.kind !== "list" || !value.value.includes(field);
    case "is_null":
      return isEmpty(field);
    case "is_not_null":
      return !isEmpty(field);
    case "regex":
      return (
        value.kind === "string" &&
        new RegExp(`^(?:${value.value})$`).test(String(field ?? ""))
      );
  }
}

/**
 * Points a single rule awards to a lead: all of `points` on a match, else 0.
 * Never throws; a rule that cannot be evaluated scores 0.
 */
export function evaluateRule(
  lead: Lead,
  rule: CompiledRule,
  now: Date = new Date()
): number {
  if (!rule.accessor || !rule.operator) return 0;

  try {
    const field = rule.accessor(lead, now);
    return matches(rule.operator, field, rule.value) ? rule.points : 0;
  } catch (err) {
    log.debug(
      { err, ruleId: rule.id, field: rule.fieldName, operator: rule.operator },
      "Rule evaluation failed, treating as no match"
    );
    return 0;
  }
}
