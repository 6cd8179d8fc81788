import { z } from "zod";
import { createChildLogger } from "../config/logger.js";
import { NotFoundError, ValidationError } from "../errors.js";
import type { LeadActivity } from "../db/schemas/types.js";
import type { ScoringStore } from "../db/scoring-store.js";
import type { LeadScoringEngine, ScoreBreakdown } from "./scoring-engine.js";

const log = createChildLogger("service:lead-activities");

export const activityInputSchema = z.object({
  activity_type: z.enum([
    "call",
    "email",
    "meeting",
    "demo",
    "proposal",
    "follow_up",
    "research",
    "note",
    "status_change",
  ]),
  outcome: z
    .enum([
      "successful",
      "no_response",
      "interested",
      "not_interested",
      "follow_up_needed",
      "meeting_scheduled",
      "proposal_requested",
      "",
    ])
    .default(""),
  title: z.string().min(1).max(200),
  description: z.string().default(""),
  performed_by: z.string().uuid().nullable().default(null),
});

export type ActivityInput = z.input<typeof activityInputSchema>;

export interface LoggedActivity {
  activity: LeadActivity;
  score: ScoreBreakdown;
}

/**
 * Record an activity against a lead and re-score it.
 */
export async function logLeadActivity(
  store: ScoringStore,
  engine: LeadScoringEngine,
  leadId: string,
  input: unknown
): Promise<LoggedActivity> {
  const parsed = activityInputSchema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError("Invalid activity", parsed.error.issues);
  }

  const lead = await store.getLead(leadId);
  if (!lead) throw new NotFoundError("Lead", leadId);

  const activity = await store.insertActivity({ lead_id: leadId, ...parsed.data });
  await store.updateLead(leadId, { last_contact_date: activity.created_at });

  log.info(
    { leadId, activityId: activity.id, type: activity.activity_type, outcome: activity.outcome },
    "Lead activity logged"
  );

  const score = await engine.calculateLeadScore(lead, {
    reason: `Activity logged: ${activity.title}`,
    triggeredBy: `activity:${activity.activity_type}`,
  });

  return { activity, score };
}
