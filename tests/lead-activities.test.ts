import { describe, it, expect, vi } from "vitest";
import { logLeadActivity } from "../src/services/lead-activities.js";
import { LeadScoringEngine } from "../src/services/scoring-engine.js";
import { compileProfile } from "../src/services/scoring-profiles.js";
import { NotFoundError, ValidationError } from "../src/errors.js";
import { MemoryScoringStore } from "./support/memory-store.js";
import { NOW, makeLead, makeProfileConfiguration } from "./support/factories.js";

function setup() {
  const store = new MemoryScoringStore(() => NOW);
  const config = makeProfileConfiguration([
    { name: "Engagement", category: "engagement" },
  ]);
  store.addConfiguration(config);
  const engine = new LeadScoringEngine(store, compileProfile(config), {
    notify: vi.fn().mockResolvedValue(undefined),
    clock: () => NOW,
  });
  const lead = makeLead();
  store.leads.push(lead);
  return { store, engine, lead };
}

describe("logLeadActivity", () => {
  it("records the activity, touches the lead and re-scores it", async () => {
    const { store, engine, lead } = setup();

    const { activity, score } = await logLeadActivity(store, engine, lead.id, {
      activity_type: "meeting",
      outcome: "interested",
      title: "Discovery meeting",
    });

    expect(activity).toMatchObject({
      lead_id: lead.id,
      activity_type: "meeting",
      outcome: "interested",
      title: "Discovery meeting",
      description: "",
      performed_by: null,
    });
    // recency 40 + quality 10 for one positive outcome today
    expect(score.total).toBe(50);
    expect(store.leads[0]?.last_contact_date).toEqual(NOW);
    expect(store.leads[0]?.score).toBe(50);
    expect(store.history[0]?.triggered_by).toBe("activity:meeting");
    expect(store.history[0]?.change_reason).toBe("Activity logged: Discovery meeting");
  });

  it("rejects invalid activities", async () => {
    const { store, engine, lead } = setup();
    await expect(
      logLeadActivity(store, engine, lead.id, { activity_type: "fax", title: "Sent a fax" })
    ).rejects.toBeInstanceOf(ValidationError);
    expect(store.activities).toHaveLength(0);
  });

  it("rejects unknown leads", async () => {
    const { store, engine } = setup();
    await expect(
      logLeadActivity(store, engine, "missing", { activity_type: "call", title: "Call" })
    ).rejects.toBeInstanceOf(NotFoundError);
  });
});
