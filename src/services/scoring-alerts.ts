import { createChildLogger } from "../config/logger.js";
import { NotFoundError } from "../errors.js";
import type {
  Lead,
  NewScoringAlert,
  ScoringAlert,
} from "../db/schemas/types.js";
import type {
  AlertFilter,
  ScoringProfileRecord,
  ScoringStore,
} from "../db/scoring-store.js";

const log = createChildLogger("service:scoring-alerts");

// Minimum swing between two passes that raises a score change alert
export const SCORE_SWING_THRESHOLD = 20;

export type AlertNotifier = (alert: ScoringAlert, lead: Lead) => Promise<void>;

export interface AlertContext {
  lead: Lead;
  profile: Pick<ScoringProfileRecord, "hot_lead_threshold" | "auto_assign_threshold">;
  oldScore: number;
  newScore: number;
  // An unacknowledged assignment_needed alert already exists for the lead
  hasOpenAssignmentAlert: boolean;
}

export function leadFullName(lead: Pick<Lead, "first_name" | "last_name">): string {
  return `${lead.first_name} ${lead.last_name}`.trim();
}

/**
 * Decide which alerts a scoring pass raises.
 *
 * - hot_lead fires only on the pass that crosses the hot threshold upwards.
 * - score_increase / score_decrease fire on any swing of 20+ points.
 * - assignment_needed fires while the lead is unassigned at or above the
 *   auto-assign threshold, unless an unacknowledged one is still open.
 */
export function evaluateScoringAlerts(ctx: AlertContext): NewScoringAlert[] {
  const { lead, profile, oldScore, newScore } = ctx;
  const name = leadFullName(lead);
  const alerts: NewScoringAlert[] = [];

  if (newScore >= profile.hot_lead_threshold && oldScore < profile.hot_lead_threshold) {
    alerts.push({
      lead_id: lead.id,
      alert_type: "hot_lead",
      priority: "high",
      title: `Hot Lead Alert: ${name}`,
      message: `Lead score reached ${newScore} (threshold: ${profile.hot_lead_threshold})`,
      threshold_value: profile.hot_lead_threshold,
      current_score: newScore,
      assigned_to: lead.assigned_to,
      notify_supervisors: true,
    });
  }

  const change = newScore - oldScore;
  if (change >= SCORE_SWING_THRESHOLD) {
    alerts.push({
      lead_id: lead.id,
      alert_type: "score_increase",
      priority: "medium",
      title: `Score Increase: ${name}`,
      message: `Lead score increased by ${change} points to ${newScore}`,
      threshold_value: null,
      current_score: newScore,
      assigned_to: lead.assigned_to,
    });
  } else if (-change >= SCORE_SWING_THRESHOLD) {
    alerts.push({
      lead_id: lead.id,
      alert_type: "score_decrease",
      priority: "medium",
      title: `Score Decrease: ${name}`,
      message: `Lead score decreased by ${-change} points to ${newScore}`,
      threshold_value: null,
      current_score: newScore,
      assigned_to: lead.assigned_to,
    });
  }

  if (
    newScore >= profile.auto_assign_threshold &&
    !lead.assigned_to &&
    !ctx.hasOpenAssignmentAlert
  ) {
    alerts.push({
      lead_id: lead.id,
      alert_type: "assignment_needed",
      priority: "high",
      title: `Assignment Needed: ${name}`,
      message: `High-scoring lead (${newScore} points) needs salesperson assignment`,
      threshold_value: profile.auto_assign_threshold,
      current_score: newScore,
      assigned_to: null,
      notify_supervisors: true,
    });
  }

  return alerts;
}

export async function listAlerts(
  store: ScoringStore,
  filter: AlertFilter
): Promise<ScoringAlert[]> {
  return store.listAlerts(filter);
}

export async function markAlertRead(
  store: ScoringStore,
  alertId: string
): Promise<ScoringAlert> {
  const alert = await store.updateAlert(alertId, { is_read: true });
  if (!alert) throw new NotFoundError("Scoring alert", alertId);
  return alert;
}

/**
 * Acknowledge an alert on behalf of a user. The first acknowledgement wins;
 * acknowledging again returns the alert unchanged.
 */
export async function acknowledgeAlert(
  store: ScoringStore,
  alertId: string,
  userId: string,
  now: Date = new Date()
): Promise<ScoringAlert> {
  const alert = await store.getAlert(alertId);
  if (!alert) throw new NotFoundError("Scoring alert", alertId);

  if (alert.is_acknowledged) {
    log.debug({ alertId, acknowledgedBy: alert.acknowledged_by }, "Alert already acknowledged");
    return alert;
  }

  const updated = await store.updateAlert(alertId, {
    is_acknowledged: true,
    acknowledged_by: userId,
    acknowledged_at: now,
  });
  if (!updated) throw new NotFoundError("Scoring alert", alertId);

  log.info({ alertId, userId, alertType: alert.alert_type }, "Alert acknowledged");
  return updated;
}
