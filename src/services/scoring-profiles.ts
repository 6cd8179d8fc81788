import { readFileSync } from "node:fs";
import { z } from "zod";
import { createChildLogger } from "../config/logger.js";
import { NotFoundError, ValidationError } from "../errors.js";
import type { CriteriaCategory } from "../db/schemas/types.js";
import type {
  NewScoringConfiguration,
  ProfileConfiguration,
  ScoringProfileRecord,
  ScoringStore,
} from "../db/scoring-store.js";
import { isLeadFieldName } from "./lead-fields.js";
import { compileRule, ruleOperatorSchema, type CompiledRule } from "./rule-evaluator.js";
import { serializeRuleValue } from "./rule-values.js";

const log = createChildLogger("service:scoring-profiles");

const DEFAULT_CONFIG_URL = new URL(
  "../../config/default-scoring.json",
  import.meta.url
);

export interface CompiledCriterion {
  id: string;
  name: string;
  category: CriteriaCategory;
  weight: number;
  maxScore: number;
  weightMultiplier: number;
  isActive: boolean;
  isEnabled: boolean;
  rules: CompiledRule[];
}

export interface ScoringProfile {
  profile: ScoringProfileRecord;
  criteria: CompiledCriterion[];
  configurationIssues: string[];
}

// ─── Starter configuration schema ──────────────────

const categorySchema = z.enum([
  "demographic",
  "firmographic",
  "behavioral",
  "engagement",
  "source",
  "temporal",
]);

const activityTypeSchema = z.enum([
  "call",
  "email",
  "meeting",
  "demo",
  "proposal",
  "follow_up",
  "research",
  "note",
  "status_change",
]);

const outcomeSchema = z.enum([
  "successful",
  "no_response",
  "interested",
  "not_interested",
  "follow_up_needed",
  "meeting_scheduled",
  "proposal_requested",
]);

const scalarSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const ruleSchema = z.object({
  field_name: z.string().refine(isLeadFieldName, { message: "Unknown lead field" }),
  operator: ruleOperatorSchema,
  value: z.union([scalarSchema, z.array(scalarSchema)]),
  points: z.number().int().min(-100).max(100),
  description: z.string().default(""),
});

const criterionSchema = z.object({
  name: z.string().min(1),
  category: categorySchema,
  description: z.string().default(""),
  weight: z.number().min(0.1).max(10),
  max_score: z.number().int().min(1).max(100),
  weight_multiplier: z.number().positive().default(1),
  rules: z.array(ruleSchema).default([]),
});

const activityRuleSchema = z.object({
  name: z.string().min(1),
  activity_type: z.union([activityTypeSchema, z.literal("")]).default(""),
  outcome: z.union([outcomeSchema, z.literal("")]).default(""),
  points_per_activity: z.number().int(),
  max_points_per_day: z.number().int(),
  decay_days: z.number().int().min(0),
  decay_rate: z.number().min(0),
});

export const scoringConfigurationSchema = z.object({
  profile: z.object({
    name: z.string().min(1),
    description: z.string().default(""),
    is_default: z.boolean().default(true),
    hot_lead_threshold: z.number().int().min(0).max(100).default(75),
    auto_assign_threshold: z.number().int().min(0).max(100).default(80),
  }),
  criteria: z.array(criterionSchema).min(1),
  activityRules: z.array(activityRuleSchema).default([]),
});

/**
 * Validate a starter configuration document and convert it to store input.
 * Rule values are serialized to their stored JSON form; rule order follows
 * document order.
 */
export function parseScoringConfiguration(input: unknown): NewScoringConfiguration {
  const parsed = scoringConfigurationSchema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError("Invalid scoring configuration", parsed.error.issues);
  }

  const { profile, criteria, activityRules } = parsed.data;
  return {
    profile,
    criteria: criteria.map((c) => ({
      ...c,
      rules: c.rules.map((r, index) => ({
        field_name: r.field_name,
        operator: r.operator,
        value: serializeRuleValue(r.value),
        points: r.points,
        description: r.description,
        sort_order: index,
      })),
    })),
    activityRules,
  };
}

export function loadDefaultScoringConfiguration(
  url: URL = DEFAULT_CONFIG_URL
): NewScoringConfiguration {
  const raw: unknown = JSON.parse(readFileSync(url, "utf8"));
  return parseScoringConfiguration(raw);
}

// ─── Compilation ───────────────────────────────────

export function compileProfile(config: ProfileConfiguration): ScoringProfile {
  const configurationIssues: string[] = [];

  const criteria = config.criteria.map((entry): CompiledCriterion => {
    const rules = entry.rules.map((record) => {
      const { rule, issues } = compileRule(record);
      configurationIssues.push(...issues.map((i) => `${entry.criteria.name}: ${i}`));
      return rule;
    });

    return {
      id: entry.criteria.id,
      name: entry.criteria.name,
      category: entry.criteria.category,
      weight: entry.criteria.weight,
      maxScore: entry.criteria.max_score,
      weightMultiplier: entry.weight_multiplier,
      isActive: entry.criteria.is_active,
      isEnabled: entry.is_enabled,
      rules: [...rules].sort((a, b) => a.sortOrder - b.sortOrder),
    };
  });

  if (configurationIssues.length > 0) {
    log.warn(
      { profileId: config.profile.id, issues: configurationIssues },
      "Scoring profile has misconfigured rules; they will score 0"
    );
  }

  return { profile: config.profile, criteria, configurationIssues };
}

// ─── Profile lookup and maintenance ────────────────

/**
 * Return the default active profile, creating the starter configuration
 * when none exists. Meant to run once at startup.
 */
export async function getOrCreateDefaultProfile(
  store: ScoringStore,
  loadDefaults: () => NewScoringConfiguration = loadDefaultScoringConfiguration
): Promise<ScoringProfile> {
  const existing = await store.findDefaultProfile();
  if (existing) return compileProfile(existing);

  log.warn("No default scoring profile found, creating starter configuration");
  const created = await store.createScoringConfiguration(loadDefaults());
  return compileProfile(created);
}

export async function loadProfile(
  store: ScoringStore,
  profileId: string
): Promise<ScoringProfile> {
  const config = await store.findProfile(profileId);
  if (!config) throw new NotFoundError("Scoring profile", profileId);
  return compileProfile(config);
}

export const profileInputSchema = z.object({
  id: z.string().uuid().optional(),
  name: z.string().min(1).max(100),
  description: z.string().default(""),
  is_default: z.boolean().default(false),
  is_active: z.boolean().default(true),
  hot_lead_threshold: z.number().int().min(0).max(100).default(75),
  auto_assign_threshold: z.number().int().min(0).max(100).default(80),
});

/**
 * Create or update a profile. Marking it default demotes the previous one.
 */
export async function saveProfile(
  store: ScoringStore,
  input: unknown
): Promise<ScoringProfileRecord> {
  const parsed = profileInputSchema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError("Invalid scoring profile", parsed.error.issues);
  }

  const saved = await store.saveProfile(parsed.data);
  log.info({ profileId: saved.id, isDefault: saved.is_default }, "Scoring profile saved");
  return saved;
}

export async function resetScoringConfiguration(store: ScoringStore): Promise<void> {
  await store.resetScoringConfiguration();
}
