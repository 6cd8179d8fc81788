import type { ActivityOutcome, LeadActivity } from "../db/schemas/types.js";
import type { ActivityScoringRule } from "../db/scoring-store.js";

const DAY_MS = 86_400_000;
const ENGAGEMENT_WINDOW_DAYS = 30;

const POSITIVE_OUTCOMES: ReadonlySet<ActivityOutcome | ""> = new Set([
  "interested",
  "meeting_scheduled",
  "proposal_requested",
]);

// [max age in days, points], checked in order
const RECENCY_BRACKETS: ReadonlyArray<readonly [number, number]> = [
  [1, 40],
  [3, 30],
  [7, 20],
  [14, 10],
];

// [min activity count, points], checked in order
const FREQUENCY_BRACKETS: ReadonlyArray<readonly [number, number]> = [
  [10, 30],
  [5, 20],
  [2, 10],
];

const QUALITY_POINTS_PER_ACTIVITY = 10;
const QUALITY_MAX = 30;

export interface EngagementBreakdown {
  recency: number;
  frequency: number;
  quality: number;
  total: number;
}

/** Whole days elapsed since the activity was logged. */
export function activityAgeDays(activity: LeadActivity, now: Date): number {
  return Math.floor((now.getTime() - activity.created_at.getTime()) / DAY_MS);
}

export function ruleMatchesActivity(
  rule: ActivityScoringRule,
  activity: LeadActivity
): boolean {
  const typeMatches =
    rule.activity_type === "" || rule.activity_type === activity.activity_type;
  const outcomeMatches = rule.outcome === "" || rule.outcome === activity.outcome;
  return typeMatches && outcomeMatches;
}

/**
 * Multiplier applied to an activity's points once it is older than the
 * rule's grace period: exp(-rate * days past the grace period).
 */
export function decayFactor(rule: ActivityScoringRule, ageDays: number): number {
  if (ageDays <= rule.decay_days) return 1;
  return Math.exp(-rule.decay_rate * (ageDays - rule.decay_days));
}

export function activityRulePoints(
  rule: ActivityScoringRule,
  activity: LeadActivity,
  now: Date
): number {
  const age = activityAgeDays(activity, now);
  if (age <= rule.decay_days) return rule.points_per_activity;
  return Math.trunc(rule.points_per_activity * decayFactor(rule, age));
}

/**
 * Behavioral score: every activity against every matching activity rule,
 * time-decayed, clamped to 0-100.
 */
export function calculateBehavioralScore(
  activities: LeadActivity[],
  rules: ActivityScoringRule[],
  now: Date = new Date()
): number {
  let score = 0;

  for (const activity of activities) {
    for (const rule of rules) {
      if (!rule.is_active || !ruleMatchesActivity(rule, activity)) continue;
      score += activityRulePoints(rule, activity, now);
    }
  }

  return Math.max(0, Math.min(100, score));
}

/**
 * Engagement score from recency (max 40), frequency over the last 30 days
 * (max 30) and positive outcomes over the last 30 days (max 30).
 */
export function calculateEngagement(
  activities: LeadActivity[],
  now: Date = new Date()
): EngagementBreakdown {
  if (activities.length === 0) {
    return { recency: 0, frequency: 0, quality: 0, total: 0 };
  }

  const latest = activities.reduce(
    (max, a) => Math.max(max, a.created_at.getTime()),
    Number.NEGATIVE_INFINITY
  );
  const daysSinceLast = Math.floor((now.getTime() - latest) / DAY_MS);
  const recency =
    RECENCY_BRACKETS.find(([maxDays]) => daysSinceLast <= maxDays)?.[1] ?? 0;

  const windowStart = now.getTime() - ENGAGEMENT_WINDOW_DAYS * DAY_MS;
  const recent = activities.filter((a) => a.created_at.getTime() >= windowStart);

  const frequency =
    FREQUENCY_BRACKETS.find(([minCount]) => recent.length >= minCount)?.[1] ?? 0;

  const positive = recent.filter((a) => POSITIVE_OUTCOMES.has(a.outcome)).length;
  const quality = Math.min(QUALITY_MAX, positive * QUALITY_POINTS_PER_ACTIVITY);

  return { recency, frequency, quality, total: recency + frequency + quality };
}

export function calculateEngagementScore(
  activities: LeadActivity[],
  now: Date = new Date()
): number {
  return calculateEngagement(activities, now).total;
}
