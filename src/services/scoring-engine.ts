import { createChildLogger } from "../config/logger.js";
import { notifyScoringAlert } from "../connectors/slack/client.js";
import type {
  CriteriaCategory,
  Lead,
  LeadActivity,
  LeadScoreHistory,
  ScoringAlert,
} from "../db/schemas/types.js";
import type { ActivityScoringRule, ScoringStore } from "../db/scoring-store.js";
import {
  calculateBehavioralScore,
  calculateEngagement,
  type EngagementBreakdown,
} from "./activity-scoring.js";
import { evaluateRule } from "./rule-evaluator.js";
import { evaluateScoringAlerts, type AlertNotifier } from "./scoring-alerts.js";
import {
  getOrCreateDefaultProfile,
  type CompiledCriterion,
  type ScoringProfile,
} from "./scoring-profiles.js";

const log = createChildLogger("service:scoring-engine");

const DEFAULT_REASON = "Automated scoring calculation";
const DEFAULT_TRIGGER = "system";

export type CategoryScores = Record<CriteriaCategory, number>;

export interface ScoreBreakdown extends CategoryScores {
  total: number;
  // Criterion name -> contribution
  details: Record<string, number>;
}

export interface CalculateOptions {
  saveHistory?: boolean;
  reason?: string;
  triggeredBy?: string;
}

export interface EngineOptions {
  notify?: AlertNotifier;
  clock?: () => Date;
}

export interface MatchingRule {
  ruleId: string;
  fieldName: string;
  description: string;
  points: number;
}

export interface CriterionExplanation {
  name: string;
  category: CriteriaCategory;
  score: number;
  maxScore: number;
  weight: number;
  weightMultiplier: number;
  matchingRules: MatchingRule[];
}

export interface ScoreExplanation {
  leadId: string;
  totalScore: number;
  profile: { id: string; name: string };
  criteria: CriterionExplanation[];
  behavioralImpact: number;
  engagementImpact: number;
  engagement: EngagementBreakdown;
  configurationIssues: string[];
}

interface CriterionResult {
  criterion: CompiledCriterion;
  contribution: number;
  matchingRules: MatchingRule[];
}

interface ActivitySignals {
  behavioral: number;
  engagement: EngagementBreakdown;
}

const ACTIVITY_FED: ReadonlySet<CriteriaCategory> = new Set(["behavioral", "engagement"]);

function roundTo2(value: number): number {
  return Math.round(value * 100) / 100;
}

function emptyCategories(): CategoryScores {
  return {
    demographic: 0,
    firmographic: 0,
    behavioral: 0,
    engagement: 0,
    source: 0,
    temporal: 0,
  };
}

/**
 * Rule-based lead scoring against one profile.
 *
 * The profile is resolved when the engine is built and again on
 * `reloadProfile`; scoring a lead never creates configuration.
 */
export class LeadScoringEngine {
  private readonly notify: AlertNotifier;
  private readonly clock: () => Date;
  private activityRules: Promise<ActivityScoringRule[]> | undefined;
  private current: ScoringProfile;

  constructor(
    private readonly store: ScoringStore,
    profile: ScoringProfile,
    options: EngineOptions = {}
  ) {
    this.current = profile;
    this.notify = options.notify ?? notifyScoringAlert;
    this.clock = options.clock ?? (() => new Date());
  }

  static async create(
    store: ScoringStore,
    options: EngineOptions = {}
  ): Promise<LeadScoringEngine> {
    const profile = await getOrCreateDefaultProfile(store);
    log.info(
      { profileId: profile.profile.id, criteria: profile.criteria.length },
      "Scoring engine ready"
    );
    return new LeadScoringEngine(store, profile, options);
  }

  get profile(): ScoringProfile {
    return this.current;
  }

  /** Switch to the current default profile, e.g. after it was edited. */
  async reloadProfile(): Promise<ScoringProfile> {
    this.current = await getOrCreateDefaultProfile(this.store);
    this.activityRules = undefined;
    log.info(
      { profileId: this.current.profile.id, criteria: this.current.criteria.length },
      "Scoring profile reloaded"
    );
    return this.current;
  }

  private get scoredCriteria(): CompiledCriterion[] {
    return this.profile.criteria.filter((c) => c.isActive && c.isEnabled);
  }

  private loadActivityRules(): Promise<ActivityScoringRule[]> {
    if (!this.activityRules) {
      this.activityRules = this.store.listActivityRules().catch((err: unknown) => {
        this.activityRules = undefined;
        throw err;
      });
    }
    return this.activityRules;
  }

  private async activitySignals(lead: Lead, now: Date): Promise<ActivitySignals> {
    const [activities, rules]: [LeadActivity[], ActivityScoringRule[]] = await Promise.all([
      this.store.listLeadActivities(lead.id),
      this.loadActivityRules(),
    ]);
    return {
      behavioral: calculateBehavioralScore(activities, rules, now),
      engagement: calculateEngagement(activities, now),
    };
  }

  private evaluateCriterion(
    lead: Lead,
    criterion: CompiledCriterion,
    signals: ActivitySignals | undefined,
    now: Date
  ): CriterionResult {
    const matchingRules: MatchingRule[] = [];
    let raw = 0;

    for (const rule of criterion.rules) {
      if (!rule.isActive) continue;
      const points = evaluateRule(lead, rule, now);
      if (points !== 0) {
        matchingRules.push({
          ruleId: rule.id,
          fieldName: rule.fieldName,
          description: rule.description,
          points,
        });
      }
      raw += points;
    }

    if (signals && criterion.category === "behavioral") raw += signals.behavioral;
    if (signals && criterion.category === "engagement") raw += signals.engagement.total;

    const weighted = raw * criterion.weight * criterion.weightMultiplier;
    return {
      criterion,
      contribution: roundTo2(Math.min(weighted, criterion.maxScore)),
      matchingRules,
    };
  }

  private async evaluate(
    lead: Lead,
    now: Date,
    forceSignals = false
  ): Promise<{ results: CriterionResult[]; signals: ActivitySignals | undefined }> {
    const criteria = this.scoredCriteria;
    const needsActivities =
      forceSignals || criteria.some((c) => ACTIVITY_FED.has(c.category));
    const signals = needsActivities ? await this.activitySignals(lead, now) : undefined;

    return {
      results: criteria.map((c) => this.evaluateCriterion(lead, c, signals, now)),
      signals,
    };
  }

  /**
   * Score a lead, persist the new score, append history and raise alerts.
   */
  async calculateLeadScore(
    lead: Lead,
    options: CalculateOptions = {}
  ): Promise<ScoreBreakdown> {
    const { saveHistory = true, reason = DEFAULT_REASON, triggeredBy = DEFAULT_TRIGGER } =
      options;
    const now = this.clock();
    const { results } = await this.evaluate(lead, now);

    const categories = emptyCategories();
    const details: Record<string, number> = {};
    for (const { criterion, contribution } of results) {
      categories[criterion.category] += contribution;
      details[criterion.name] = contribution;
    }

    const sum = Object.values(categories).reduce((acc, v) => acc + v, 0);
    const total = Math.max(0, Math.min(100, Math.round(sum)));
    const oldScore = lead.score;

    await this.store.updateLead(lead.id, { score: total });
    lead.score = total;

    if (saveHistory) {
      await this.store.insertScoreHistory({
        lead_id: lead.id,
        total_score: total,
        demographic_score: Math.round(categories.demographic),
        firmographic_score: Math.round(categories.firmographic),
        behavioral_score: Math.round(categories.behavioral),
        engagement_score: Math.round(categories.engagement),
        source_score: Math.round(categories.source),
        temporal_score: Math.round(categories.temporal),
        profile_id: this.profile.profile.id,
        details,
        score_change: total - oldScore,
        change_reason: reason,
        triggered_by: triggeredBy,
      });
    }

    await this.raiseAlerts(lead, oldScore, total);

    log.debug({ leadId: lead.id, oldScore, newScore: total, triggeredBy }, "Lead scored");
    return { ...categories, total, details };
  }

  private async raiseAlerts(lead: Lead, oldScore: number, newScore: number): Promise<void> {
    const { profile } = this.profile;
    const needsAssignment =
      newScore >= profile.auto_assign_threshold && !lead.assigned_to;
    const hasOpenAssignmentAlert = needsAssignment
      ? await this.store.hasOpenAlert(lead.id, "assignment_needed")
      : false;

    const alerts = evaluateScoringAlerts({
      lead,
      profile,
      oldScore,
      newScore,
      hasOpenAssignmentAlert,
    });

    for (const draft of alerts) {
      const alert = await this.store.insertAlert(draft);
      log.info({ leadId: lead.id, alertType: alert.alert_type, score: newScore }, "Scoring alert raised");
      if (alert.notify_supervisors) await this.notifySupervisors(alert, lead);
    }
  }

  private async notifySupervisors(alert: ScoringAlert, lead: Lead): Promise<void> {
    try {
      await this.notify(alert, lead);
    } catch (err) {
      log.error({ err, alertId: alert.id, leadId: lead.id }, "Supervisor notification failed");
    }
  }

  /**
   * Re-score many leads (all active leads by default). A lead that fails is
   * logged and skipped. Returns how many leads were scored.
   */
  async bulkRecalculateScores(leads?: Lead[]): Promise<number> {
    const targets = leads ?? (await this.store.listLeads({ isActive: true }));
    let updated = 0;

    for (const lead of targets) {
      try {
        await this.calculateLeadScore(lead, {
          reason: "Bulk score recalculation",
          triggeredBy: "bulk_recalculation",
        });
        updated++;
      } catch (err) {
        log.error({ err, leadId: lead.id }, "Failed to recalculate lead score");
      }
    }

    log.info({ total: targets.length, updated }, "Bulk score recalculation finished");
    return updated;
  }

  /** How the lead's criteria score right now, without persisting anything. */
  async getScoreExplanation(lead: Lead): Promise<ScoreExplanation> {
    const now = this.clock();
    const { results, signals } = await this.evaluate(lead, now, true);
    const engagement = signals?.engagement ?? calculateEngagement([], now);

    return {
      leadId: lead.id,
      totalScore: lead.score,
      profile: { id: this.profile.profile.id, name: this.profile.profile.name },
      criteria: results.map(({ criterion, contribution, matchingRules }) => ({
        name: criterion.name,
        category: criterion.category,
        score: contribution,
        maxScore: criterion.maxScore,
        weight: criterion.weight,
        weightMultiplier: criterion.weightMultiplier,
        matchingRules,
      })),
      behavioralImpact: signals?.behavioral ?? 0,
      engagementImpact: engagement.total,
      engagement,
      configurationIssues: this.profile.configurationIssues,
    };
  }

  async getScoreHistory(leadId: string, limit = 20): Promise<LeadScoreHistory[]> {
    return this.store.listScoreHistory(leadId, limit);
  }
}
