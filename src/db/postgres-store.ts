import type { Kysely, Selectable } from "kysely";
import { createChildLogger } from "../config/logger.js";
import type {
  ActivityScoringRuleTable,
  AlertType,
  Database,
  Lead,
  LeadActivity,
  LeadScoreHistory,
  LeadScoringProfileTable,
  NewLeadActivity,
  NewLeadScoreHistory,
  NewScoringAlert,
  ScoringAlert,
  ScoringRuleTable,
  User,
  UserRole,
} from "./schemas/types.js";
import type {
  ActivityScoringRule,
  AlertFilter,
  AlertPatch,
  LeadFilter,
  LeadPatch,
  NewScoringConfiguration,
  ProfileConfiguration,
  ProfileCriterion,
  ProfileInput,
  ScoringProfileRecord,
  ScoringRuleRecord,
  ScoringStore,
} from "./scoring-store.js";

const log = createChildLogger("db:scoring-store");

function toProfile(row: Selectable<LeadScoringProfileTable>): ScoringProfileRecord {
  return {
    id: row.id,
    name: row.name,
    description: row.description,
    is_default: row.is_default,
    is_active: row.is_active,
    hot_lead_threshold: row.hot_lead_threshold,
    auto_assign_threshold: row.auto_assign_threshold,
  };
}

function toRule(row: Selectable<ScoringRuleTable>): ScoringRuleRecord {
  return {
    id: row.id,
    criteria_id: row.criteria_id,
    field_name: row.field_name,
    operator: row.operator,
    value: row.value,
    points: row.points,
    description: row.description,
    is_active: row.is_active,
    sort_order: row.sort_order,
  };
}

function toActivityRule(
  row: Selectable<ActivityScoringRuleTable>
): ActivityScoringRule {
  return {
    id: row.id,
    name: row.name,
    activity_type: row.activity_type,
    outcome: row.outcome,
    points_per_activity: row.points_per_activity,
    max_points_per_day: row.max_points_per_day,
    decay_days: row.decay_days,
    decay_rate: Number(row.decay_rate),
    is_active: row.is_active,
  };
}

/**
 * Load a profile with its criteria and every rule under them.
 * Works on the root connection or inside a transaction.
 */
async function loadConfiguration(
  db: Kysely<Database>,
  profile: ScoringProfileRecord
): Promise<ProfileConfiguration> {
  const criteriaRows = await db
    .selectFrom("profile_criteria")
    .innerJoin(
      "scoring_criteria",
      "scoring_criteria.id",
      "profile_criteria.criteria_id"
    )
    .select([
      "scoring_criteria.id",
      "scoring_criteria.name",
      "scoring_criteria.category",
      "scoring_criteria.description",
      "scoring_criteria.weight",
      "scoring_criteria.max_score",
      "scoring_criteria.is_active",
      "profile_criteria.weight_multiplier",
      "profile_criteria.is_enabled",
    ])
    .where("profile_criteria.profile_id", "=", profile.id)
    .orderBy("scoring_criteria.category")
    .orderBy("scoring_criteria.name")
    .execute();

  const criteriaIds = criteriaRows.map((c) => c.id);
  const ruleRows =
    criteriaIds.length === 0
      ? []
      : await db
          .selectFrom("scoring_rules")
          .selectAll()
          .where("criteria_id", "in", criteriaIds)
          .orderBy("sort_order")
          .orderBy("created_at")
          .execute();

  const criteria: ProfileCriterion[] = criteriaRows.map((row) => ({
    criteria: {
      id: row.id,
      name: row.name,
      category: row.category,
      description: row.description,
      weight: Number(row.weight),
      max_score: row.max_score,
      is_active: row.is_active,
    },
    weight_multiplier: Number(row.weight_multiplier),
    is_enabled: row.is_enabled,
    rules: ruleRows.filter((r) => r.criteria_id === row.id).map(toRule),
  }));

  return { profile, criteria };
}

async function demoteDefaultProfiles(
  db: Kysely<Database>,
  exceptId?: string
): Promise<void> {
  let query = db
    .updateTable("lead_scoring_profiles")
    .set({ is_default: false })
    .where("is_default", "=", true);

  if (exceptId) {
    query = query.where("id", "!=", exceptId);
  }

  await query.execute();
}

export class PostgresScoringStore implements ScoringStore {
  constructor(private readonly db: Kysely<Database>) {}

  // ─── Configuration ─────────────────────────────────

  async findDefaultProfile(): Promise<ProfileConfiguration | undefined> {
    const row = await this.db
      .selectFrom("lead_scoring_profiles")
      .selectAll()
      .where("is_default", "=", true)
      .where("is_active", "=", true)
      .executeTakeFirst();

    return row ? loadConfiguration(this.db, toProfile(row)) : undefined;
  }

  async findProfile(id: string): Promise<ProfileConfiguration | undefined> {
    const row = await this.db
      .selectFrom("lead_scoring_profiles")
      .selectAll()
      .where("id", "=", id)
      .executeTakeFirst();

    return row ? loadConfiguration(this.db, toProfile(row)) : undefined;
  }

  async createScoringConfiguration(
    config: NewScoringConfiguration
  ): Promise<ProfileConfiguration> {
    return this.db.transaction().execute(async (trx) => {
      if (config.profile.is_default) {
        await demoteDefaultProfiles(trx);
      }

      const profileRow = await trx
        .insertInto("lead_scoring_profiles")
        .values({ ...config.profile, is_active: true })
        .returningAll()
        .executeTakeFirstOrThrow();

      for (const entry of config.criteria) {
        const created = await trx
          .insertInto("scoring_criteria")
          .values({
            name: entry.name,
            category: entry.category,
            description: entry.description,
            weight: entry.weight,
            max_score: entry.max_score,
          })
          .onConflict((oc) => oc.column("name").doNothing())
          .returning("id")
          .executeTakeFirst();

        let criteriaId: string;
        if (created) {
          const newId = created.id;
          criteriaId = newId;
          if (entry.rules.length > 0) {
            await trx
              .insertInto("scoring_rules")
              .values(entry.rules.map((r) => ({ ...r, criteria_id: newId })))
              .execute();
          }
        } else {
          // Reuse a criterion another profile already defined
          const existing = await trx
            .selectFrom("scoring_criteria")
            .select("id")
            .where("name", "=", entry.name)
            .executeTakeFirstOrThrow();
          criteriaId = existing.id;
        }

        await trx
          .insertInto("profile_criteria")
          .values({
            profile_id: profileRow.id,
            criteria_id: criteriaId,
            weight_multiplier: entry.weight_multiplier,
            is_enabled: true,
          })
          .onConflict((oc) => oc.columns(["profile_id", "criteria_id"]).doNothing())
          .execute();
      }

      if (config.activityRules.length > 0) {
        await trx
          .insertInto("activity_scoring_rules")
          .values(config.activityRules)
          .onConflict((oc) => oc.column("name").doNothing())
          .execute();
      }

      log.info(
        { profileId: profileRow.id, criteria: config.criteria.length },
        "Scoring configuration created"
      );

      return loadConfiguration(trx, toProfile(profileRow));
    });
  }

  async saveProfile(input: ProfileInput): Promise<ScoringProfileRecord> {
    return this.db.transaction().execute(async (trx) => {
      const { id, ...values } = input;

      if (values.is_default) {
        await demoteDefaultProfiles(trx, id);
      }

      const row = id
        ? await trx
            .updateTable("lead_scoring_profiles")
            .set({ ...values, updated_at: new Date() })
            .where("id", "=", id)
            .returningAll()
            .executeTakeFirstOrThrow()
        : await trx
            .insertInto("lead_scoring_profiles")
            .values(values)
            .returningAll()
            .executeTakeFirstOrThrow();

      return toProfile(row);
    });
  }

  async resetScoringConfiguration(): Promise<void> {
    await this.db.transaction().execute(async (trx) => {
      await trx.deleteFrom("scoring_rules").execute();
      await trx.deleteFrom("activity_scoring_rules").execute();
      await trx.deleteFrom("profile_criteria").execute();
      await trx.deleteFrom("scoring_criteria").execute();
      await trx.deleteFrom("lead_scoring_profiles").execute();
    });
    log.warn("Scoring configuration reset");
  }

  async listActivityRules(): Promise<ActivityScoringRule[]> {
    const rows = await this.db
      .selectFrom("activity_scoring_rules")
      .selectAll()
      .where("is_active", "=", true)
      .orderBy("activity_type")
      .orderBy("outcome")
      .execute();

    return rows.map(toActivityRule);
  }

  // ─── Leads and activities ──────────────────────────

  async getLead(id: string): Promise<Lead | undefined> {
    return this.db
      .selectFrom("leads")
      .selectAll()
      .where("id", "=", id)
      .executeTakeFirst();
  }

  async listLeads(filter: LeadFilter): Promise<Lead[]> {
    let query = this.db.selectFrom("leads").selectAll();

    if (filter.isActive !== undefined) {
      query = query.where("is_active", "=", filter.isActive);
    }
    if (filter.unassigned) {
      query = query.where("assigned_to", "is", null);
    }
    if (filter.minScore !== undefined) {
      query = query.where("score", ">=", filter.minScore);
    }
    if (filter.isQualified !== undefined) {
      query = query.where("is_qualified", "=", filter.isQualified);
    }
    if (filter.statuses && filter.statuses.length > 0) {
      query = query.where("status", "in", filter.statuses);
    }
    if (filter.withoutFollowUp) {
      query = query.where("next_follow_up_date", "is", null);
    }

    return query.orderBy("created_at").orderBy("id").execute();
  }

  async updateLead(id: string, patch: LeadPatch): Promise<void> {
    await this.db
      .updateTable("leads")
      .set(patch)
      .where("id", "=", id)
      .execute();
  }

  async listLeadActivities(leadId: string): Promise<LeadActivity[]> {
    return this.db
      .selectFrom("lead_activities")
      .selectAll()
      .where("lead_id", "=", leadId)
      .orderBy("created_at", "desc")
      .execute();
  }

  async insertActivity(activity: NewLeadActivity): Promise<LeadActivity> {
    return this.db
      .insertInto("lead_activities")
      .values(activity)
      .returningAll()
      .executeTakeFirstOrThrow();
  }

  async listActiveUsers(roles?: UserRole[]): Promise<User[]> {
    let query = this.db
      .selectFrom("users")
      .selectAll()
      .where("is_active", "=", true);

    if (roles && roles.length > 0) {
      query = query.where("role", "in", roles);
    }

    return query.orderBy("created_at").orderBy("id").execute();
  }

  // ─── Score history ─────────────────────────────────

  async insertScoreHistory(
    entry: NewLeadScoreHistory
  ): Promise<LeadScoreHistory> {
    return this.db
      .insertInto("lead_score_history")
      .values(entry)
      .returningAll()
      .executeTakeFirstOrThrow();
  }

  async listScoreHistory(
    leadId: string,
    limit: number
  ): Promise<LeadScoreHistory[]> {
    return this.db
      .selectFrom("lead_score_history")
      .selectAll()
      .where("lead_id", "=", leadId)
      .orderBy("created_at", "desc")
      .limit(limit)
      .execute();
  }

  // ─── Alerts ────────────────────────────────────────

  async insertAlert(alert: NewScoringAlert): Promise<ScoringAlert> {
    return this.db
      .insertInto("scoring_alerts")
      .values(alert)
      .returningAll()
      .executeTakeFirstOrThrow();
  }

  async hasOpenAlert(leadId: string, alertType: AlertType): Promise<boolean> {
    const row = await this.db
      .selectFrom("scoring_alerts")
      .select("id")
      .where("lead_id", "=", leadId)
      .where("alert_type", "=", alertType)
      .where("is_acknowledged", "=", false)
      .executeTakeFirst();

    return row !== undefined;
  }

  async getAlert(id: string): Promise<ScoringAlert | undefined> {
    return this.db
      .selectFrom("scoring_alerts")
      .selectAll()
      .where("id", "=", id)
      .executeTakeFirst();
  }

  async listAlerts(filter: AlertFilter): Promise<ScoringAlert[]> {
    let query = this.db.selectFrom("scoring_alerts").selectAll();

    if (filter.leadId) {
      query = query.where("lead_id", "=", filter.leadId);
    }
    if (filter.assignedTo) {
      query = query.where("assigned_to", "=", filter.assignedTo);
    }
    if (filter.unreadOnly) {
      query = query.where("is_read", "=", false);
    }
    if (filter.unacknowledgedOnly) {
      query = query.where("is_acknowledged", "=", false);
    }

    return query
      .orderBy("created_at", "desc")
      .limit(filter.limit ?? 50)
      .execute();
  }

  async updateAlert(
    id: string,
    patch: AlertPatch
  ): Promise<ScoringAlert | undefined> {
    return this.db
      .updateTable("scoring_alerts")
      .set(patch)
      .where("id", "=", id)
      .returningAll()
      .executeTakeFirst();
  }
}
