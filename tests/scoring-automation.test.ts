import { describe, it, expect, vi } from "vitest";
import {
  autoAssignLeads,
  followUpDelayDays,
  markQualifiedLeads,
  priorityForScore,
  runScoringAutomation,
  scheduleFollowUps,
  updateLeadPriorities,
} from "../src/services/scoring-automation.js";
import { LeadScoringEngine } from "../src/services/scoring-engine.js";
import { compileProfile } from "../src/services/scoring-profiles.js";
import type { Lead } from "../src/db/schemas/types.js";
import { MemoryScoringStore } from "./support/memory-store.js";
import {
  NOW,
  daysAgo,
  makeLead,
  makeProfileConfiguration,
  makeUser,
} from "./support/factories.js";

function storeWith(leads: Array<Partial<Lead>>) {
  const store = new MemoryScoringStore(() => NOW);
  store.leads = leads.map((l, i) => makeLead({ created_at: daysAgo(30 - i), ...l }));
  return store;
}

describe("priority buckets", () => {
  it("maps scores to priorities at the bucket edges", () => {
    expect([100, 80, 79, 60, 59, 40, 39, 0].map(priorityForScore)).toEqual([
      "hot",
      "hot",
      "high",
      "high",
      "medium",
      "medium",
      "low",
      "low",
    ]);
  });

  it("updates only leads whose bucket changed", async () => {
    const store = storeWith([
      { score: 85, priority: "medium" },
      { score: 65, priority: "high" },
      { score: 10, priority: "medium" },
    ]);

    expect(await updateLeadPriorities(store)).toBe(2);
    expect(store.leads.map((l) => l.priority)).toEqual(["hot", "high", "low"]);
  });

  it("is idempotent", async () => {
    const store = storeWith([{ score: 85 }, { score: 45 }, { score: 5 }]);
    await updateLeadPriorities(store);
    const after = store.leads.map((l) => l.priority);

    expect(await updateLeadPriorities(store)).toBe(0);
    expect(store.leads.map((l) => l.priority)).toEqual(after);
  });
});

describe("autoAssignLeads", () => {
  it("round-robins high scorers across active users and notes each assignment", async () => {
    const store = storeWith([
      { score: 90 },
      { score: 85 },
      { score: 80 },
      { score: 79 },
      { score: 95, assigned_to: "already-assigned" },
    ]);
    const alice = makeUser({ full_name: "Alice" });
    const bruno = makeUser({ full_name: "Bruno" });
    store.users = [alice, bruno, makeUser({ is_active: false })];

    expect(await autoAssignLeads(store)).toBe(3);
    expect(store.leads.map((l) => l.assigned_to)).toEqual([
      alice.id,
      bruno.id,
      alice.id,
      null,
      "already-assigned",
    ]);

    expect(store.activities).toHaveLength(3);
    expect(store.activities[0]).toMatchObject({
      activity_type: "note",
      outcome: "successful",
      title: "Auto-assigned based on lead score",
      description: "Lead automatically assigned to Alice due to high score (90)",
    });
  });

  it("restricts candidates by role when asked", async () => {
    const store = storeWith([{ score: 90 }]);
    const manager = makeUser({ role: "manager" });
    const rep = makeUser({ role: "salesperson" });
    store.users = [manager, rep];

    await autoAssignLeads(store, { candidateRoles: ["salesperson"] });
    expect(store.leads[0]?.assigned_to).toBe(rep.id);
  });

  it("does nothing without candidates", async () => {
    const store = storeWith([{ score: 90 }]);
    expect(await autoAssignLeads(store)).toBe(0);
    expect(store.leads[0]?.assigned_to).toBeNull();
  });

  it("skips a failing lead and keeps the rotation going", async () => {
    const store = storeWith([{ score: 90 }, { score: 90 }, { score: 90 }]);
    const alice = makeUser();
    const bruno = makeUser();
    store.users = [alice, bruno];
    const broken = store.leads[0];
    if (!broken) throw new Error("lead missing");
    store.failingLeadIds.add(broken.id);

    expect(await autoAssignLeads(store)).toBe(2);
    expect(store.leads.map((l) => l.assigned_to)).toEqual([null, alice.id, bruno.id]);
  });

  it("counts an assignment whose note could not be written", async () => {
    const store = storeWith([{ score: 90 }, { score: 90 }]);
    const alice = makeUser();
    const bruno = makeUser();
    store.users = [alice, bruno];
    const first = store.leads[0];
    if (!first) throw new Error("lead missing");
    store.failingActivityLeadIds.add(first.id);

    expect(await autoAssignLeads(store)).toBe(2);
    expect(store.leads.map((l) => l.assigned_to)).toEqual([alice.id, bruno.id]);
    expect(store.activities.map((a) => a.lead_id)).toEqual([store.leads[1]?.id]);
  });
});

describe("markQualifiedLeads", () => {
  it("qualifies active leads at or above the threshold and never un-qualifies", async () => {
    const store = storeWith([
      { score: 70 },
      { score: 69 },
      { score: 20, is_qualified: true },
      { score: 90, is_active: false },
    ]);

    expect(await markQualifiedLeads(store)).toBe(1);
    expect(store.leads.map((l) => l.is_qualified)).toEqual([true, false, true, false]);
  });

  it("honours a custom threshold", async () => {
    const store = storeWith([{ score: 55 }]);
    expect(await markQualifiedLeads(store, { threshold: 50 })).toBe(1);
  });
});

describe("scheduleFollowUps", () => {
  it("sets the next follow-up from the score bucket", async () => {
    const existing = daysAgo(-5);
    const store = storeWith([
      { score: 85, status: "new" },
      { score: 60, status: "contacted" },
      { score: 45, status: "new" },
      { score: 10, status: "new" },
      { score: 90, status: "qualified" },
      { score: 90, status: "new", next_follow_up_date: existing },
    ]);

    expect(await scheduleFollowUps(store, NOW)).toBe(4);
    expect(store.leads.map((l) => l.next_follow_up_date?.toISOString() ?? null)).toEqual([
      "2026-03-11T12:00:00.000Z",
      "2026-03-13T12:00:00.000Z",
      "2026-03-17T12:00:00.000Z",
      "2026-03-24T12:00:00.000Z",
      null,
      existing.toISOString(),
    ]);
  });

  it("uses 1, 3, 7 and 14 day delays", () => {
    expect([80, 60, 40, 39].map(followUpDelayDays)).toEqual([1, 3, 7, 14]);
  });
});

describe("runScoringAutomation", () => {
  it("re-scores then runs every sweep", async () => {
    const store = storeWith([
      { annual_revenue: "over_100m", status: "new" },
      { annual_revenue: "small", status: "contacted" },
    ]);
    store.users = [makeUser()];
    const config = makeProfileConfiguration([
      {
        name: "Revenue",
        rules: [
          { field_name: "annual_revenue", value: '"over_100m"', points: 85 },
          { field_name: "annual_revenue", value: '"small"', points: 30 },
        ],
      },
    ]);
    store.addConfiguration(config);
    const engine = new LeadScoringEngine(store, compileProfile(config), {
      notify: vi.fn().mockResolvedValue(undefined),
      clock: () => NOW,
    });

    const summary = await runScoringAutomation(
      store,
      engine,
      { autoAssignThreshold: 80, qualifyThreshold: 70 },
      NOW
    );

    expect(summary).toEqual({
      rescored: 2,
      assigned: 1,
      reprioritized: 2,
      qualified: 1,
      followUpsScheduled: 2,
    });
    expect(store.leads.map((l) => [l.score, l.priority, l.is_qualified])).toEqual([
      [85, "hot", true],
      [30, "low", false],
    ]);
  });
});
