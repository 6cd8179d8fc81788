import { createChildLogger } from "../config/logger.js";
import type { Lead, LeadPriority, UserRole } from "../db/schemas/types.js";
import type { LeadPatch, ScoringStore } from "../db/scoring-store.js";
import type { LeadScoringEngine } from "./scoring-engine.js";

const log = createChildLogger("service:scoring-automation");

const DAY_MS = 86_400_000;

export interface AutoAssignOptions {
  threshold?: number;
  // Restrict assignment to these roles; every active user is a candidate otherwise
  candidateRoles?: UserRole[];
}

export interface QualifyOptions {
  threshold?: number;
}

export interface AutomationConfig {
  autoAssignThreshold: number;
  qualifyThreshold: number;
  candidateRoles?: UserRole[];
}

export interface AutomationSummary {
  rescored: number;
  assigned: number;
  reprioritized: number;
  qualified: number;
  followUpsScheduled: number;
}

export function priorityForScore(score: number): LeadPriority {
  if (score >= 80) return "hot";
  if (score >= 60) return "high";
  if (score >= 40) return "medium";
  return "low";
}

export function followUpDelayDays(score: number): number {
  if (score >= 80) return 1;
  if (score >= 60) return 3;
  if (score >= 40) return 7;
  return 14;
}

/**
 * Apply `step` to every lead, skipping (and logging) leads that fail.
 * Returns how many leads the step reported as changed.
 */
async function sweep(
  name: string,
  leads: Lead[],
  step: (lead: Lead, changedSoFar: number) => Promise<boolean>
): Promise<number> {
  let changed = 0;
  for (const lead of leads) {
    try {
      if (await step(lead, changed)) changed++;
    } catch (err) {
      log.error({ err, leadId: lead.id, sweep: name }, "Automation step failed for lead");
    }
  }
  log.info({ sweep: name, candidates: leads.length, changed }, "Automation sweep finished");
  return changed;
}

/**
 * Round-robin unassigned high-scoring leads across active users.
 */
export async function autoAssignLeads(
  store: ScoringStore,
  options: AutoAssignOptions = {}
): Promise<number> {
  const { threshold = 80, candidateRoles } = options;

  const candidates = await store.listActiveUsers(candidateRoles);
  if (candidates.length === 0) {
    log.warn({ candidateRoles }, "No active users to assign leads to");
    return 0;
  }

  const leads = await store.listLeads({ isActive: true, unassigned: true, minScore: threshold });

  return sweep("auto-assign", leads, async (lead, assignedCount) => {
    const user = candidates[assignedCount % candidates.length];
    if (!user) return false;

    await store.updateLead(lead.id, { assigned_to: user.id });
    // The assignment stands even when its note cannot be written
    try {
      await store.insertActivity({
        lead_id: lead.id,
        activity_type: "note",
        outcome: "successful",
        title: "Auto-assigned based on lead score",
        description: `Lead automatically assigned to ${user.full_name} due to high score (${lead.score})`,
        performed_by: null,
      });
    } catch (err) {
      log.error({ err, leadId: lead.id, userId: user.id }, "Failed to record auto-assign note");
    }

    log.info({ leadId: lead.id, userId: user.id, score: lead.score }, "Lead auto-assigned");
    return true;
  });
}

export async function updateLeadPriorities(store: ScoringStore): Promise<number> {
  const leads = await store.listLeads({ isActive: true });

  return sweep("priorities", leads, async (lead) => {
    const priority = priorityForScore(lead.score);
    if (priority === lead.priority) return false;
    await store.updateLead(lead.id, { priority });
    return true;
  });
}

export async function markQualifiedLeads(
  store: ScoringStore,
  options: QualifyOptions = {}
): Promise<number> {
  const { threshold = 70 } = options;
  const leads = await store.listLeads({
    isActive: true,
    isQualified: false,
    minScore: threshold,
  });

  return sweep("qualify", leads, async (lead) => {
    await store.updateLead(lead.id, { is_qualified: true });
    return true;
  });
}

export async function scheduleFollowUps(
  store: ScoringStore,
  now: Date = new Date()
): Promise<number> {
  const leads = await store.listLeads({
    isActive: true,
    statuses: ["new", "contacted"],
    withoutFollowUp: true,
  });

  return sweep("follow-ups", leads, async (lead) => {
    const patch: LeadPatch = {
      next_follow_up_date: new Date(now.getTime() + followUpDelayDays(lead.score) * DAY_MS),
    };
    await store.updateLead(lead.id, patch);
    return true;
  });
}

/**
 * Full automation pass: re-score, then assign, reprioritize, qualify and
 * schedule follow-ups.
 */
export async function runScoringAutomation(
  store: ScoringStore,
  engine: LeadScoringEngine,
  config: AutomationConfig,
  now: Date = new Date()
): Promise<AutomationSummary> {
  const rescored = await engine.bulkRecalculateScores();
  const assigned = await autoAssignLeads(store, {
    threshold: config.autoAssignThreshold,
    candidateRoles: config.candidateRoles,
  });
  const reprioritized = await updateLeadPriorities(store);
  const qualified = await markQualifiedLeads(store, { threshold: config.qualifyThreshold });
  const followUpsScheduled = await scheduleFollowUps(store, now);

  const summary = { rescored, assigned, reprioritized, qualified, followUpsScheduled };
  log.info(summary, "Scoring automation completed");
  return summary;
}
