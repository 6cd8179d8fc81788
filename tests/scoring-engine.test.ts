import { describe, it, expect, vi } from "vitest";
import { LeadScoringEngine } from "../src/services/scoring-engine.js";
import { compileProfile } from "../src/services/scoring-profiles.js";
import type { ProfileConfiguration } from "../src/db/scoring-store.js";
import type { Lead } from "../src/db/schemas/types.js";
import { MemoryScoringStore } from "./support/memory-store.js";
import {
  NOW,
  daysAgo,
  makeActivity,
  makeActivityRule,
  makeLead,
  makeProfileConfiguration,
  type CriterionOptions,
} from "./support/factories.js";

function setup(criteria: CriterionOptions[], thresholds?: { hot?: number; autoAssign?: number }) {
  const store = new MemoryScoringStore(() => NOW);
  const config: ProfileConfiguration = makeProfileConfiguration(criteria, thresholds);
  store.addConfiguration(config);
  const notify = vi.fn().mockResolvedValue(undefined);
  const engine = new LeadScoringEngine(store, compileProfile(config), {
    notify,
    clock: () => NOW,
  });
  return { store, engine, notify, config };
}

function addLead(store: MemoryScoringStore, overrides: Partial<Lead> = {}): Lead {
  const lead = makeLead(overrides);
  store.leads.push(lead);
  return { ...lead };
}

async function reload(store: MemoryScoringStore, id: string): Promise<Lead> {
  const lead = await store.getLead(id);
  if (!lead) throw new Error(`lead ${id} missing`);
  return lead;
}

const revenueRule = (value: string, points: number) => ({
  field_name: "annual_revenue",
  operator: "eq",
  value: JSON.stringify(value),
  points,
});

describe("calculateLeadScore", () => {
  it("keeps the total within 0..100", async () => {
    const { store, engine } = setup([
      { name: "Big A", weight: 2, rules: [{ field_name: "company_size", value: '"1000+"', points: 100 }] },
      { name: "Big B", weight: 2, rules: [{ field_name: "company_size", value: '"1000+"', points: 100 }] },
      { name: "Penalty", rules: [{ field_name: "industry", value: '"gambling"', points: -100 }] },
    ]);

    const high = await engine.calculateLeadScore(addLead(store, { company_size: "1000+" }));
    expect(high.total).toBe(100);

    const low = await engine.calculateLeadScore(addLead(store, { industry: "gambling" }));
    expect(low.total).toBe(0);
    expect(low.details.Penalty).toBe(-100);
  });

  it("caps each criterion at its max score", async () => {
    const { store, engine } = setup([
      { name: "Company Size", weight: 2, maxScore: 25, rules: [{ field_name: "company_size", value: '"1000+"', points: 20 }] },
    ]);

    const result = await engine.calculateLeadScore(addLead(store, { company_size: "1000+" }));
    expect(result.details["Company Size"]).toBe(25);
    expect(result.firmographic).toBe(25);
    expect(result.total).toBe(25);
  });

  it("applies the profile weight multiplier", async () => {
    const { store, engine } = setup([
      { name: "Revenue", weight: 1.5, weightMultiplier: 2, rules: [revenueRule("over_100m", 10)] },
    ]);

    const result = await engine.calculateLeadScore(addLead(store, { annual_revenue: "over_100m" }));
    expect(result.details.Revenue).toBe(30);
  });

  it("ignores inactive criteria, disabled criteria and inactive rules", async () => {
    const { store, engine } = setup([
      { name: "Inactive", isActive: false, rules: [{ points: 10 }] },
      { name: "Disabled", isEnabled: false, rules: [{ points: 10 }] },
      { name: "Mixed", rules: [{ points: 10 }, { points: 5, is_active: false }] },
    ]);

    const result = await engine.calculateLeadScore(addLead(store, { company_size: "51-200" }));
    expect(result.details).toEqual({ Mixed: 10 });
    expect(result.total).toBe(10);
  });

  it("buckets contributions by category and rounds them to 2 decimals", async () => {
    const { store, engine } = setup([
      { name: "Industry", category: "firmographic", weight: 1.2, rules: [{ field_name: "industry", value: '"retail"', points: 7 }] },
      { name: "Completeness", category: "demographic", weight: 0.8, rules: [{ field_name: "phone_number", operator: "is_not_null", value: '""', points: 3 }] },
    ]);

    const result = await engine.calculateLeadScore(
      addLead(store, { industry: "retail", phone_number: "+55 11 90000-0000" })
    );
    expect(result.details).toEqual({ Industry: 8.4, Completeness: 2.4 });
    expect(result.firmographic).toBeCloseTo(8.4);
    expect(result.demographic).toBeCloseTo(2.4);
    expect(result.total).toBe(11);
  });

  it("persists the score and appends history", async () => {
    const { store, engine, config } = setup([
      { name: "Revenue", weight: 1, rules: [revenueRule("10m_50m", 42)] },
    ]);
    const lead = addLead(store, { annual_revenue: "10m_50m", score: 30 });

    await engine.calculateLeadScore(lead);

    expect((await reload(store, lead.id)).score).toBe(42);
    expect(store.history).toHaveLength(1);
    expect(store.history[0]).toMatchObject({
      lead_id: lead.id,
      total_score: 42,
      firmographic_score: 42,
      demographic_score: 0,
      profile_id: config.profile.id,
      details: { Revenue: 42 },
      score_change: 12,
      change_reason: "Automated scoring calculation",
      triggered_by: "system",
    });
  });

  it("skips history when asked and records custom reasons", async () => {
    const { store, engine } = setup([{ name: "Revenue", rules: [revenueRule("1m_5m", 5)] }]);
    const lead = addLead(store, { annual_revenue: "1m_5m" });

    await engine.calculateLeadScore(lead, { saveHistory: false });
    expect(store.history).toHaveLength(0);

    await engine.calculateLeadScore(lead, { reason: "Budget confirmed", triggeredBy: "api" });
    expect(store.history[0]?.change_reason).toBe("Budget confirmed");
    expect(store.history[0]?.triggered_by).toBe("api");
  });

  it("raises a single hot lead alert across 70, 76, 78", async () => {
    const { store, engine, notify } = setup([
      {
        name: "Revenue",
        rules: [revenueRule("a", 70), revenueRule("b", 76), revenueRule("c", 78)],
      },
    ]);
    const lead = addLead(store, { annual_revenue: "a", score: 0 });

    await engine.calculateLeadScore(lead);
    expect((await reload(store, lead.id)).score).toBe(70);

    const stored = store.leads.find((l) => l.id === lead.id);
    if (!stored) throw new Error("lead missing");

    stored.annual_revenue = "b";
    await engine.calculateLeadScore(await reload(store, lead.id));
    stored.annual_revenue = "c";
    await engine.calculateLeadScore(await reload(store, lead.id));

    const hot = store.alerts.filter((a) => a.alert_type === "hot_lead");
    expect(hot).toHaveLength(1);
    expect(hot[0]?.current_score).toBe(76);
    expect(notify).toHaveBeenCalledTimes(1);
    expect(store.history.map((h) => h.score_change)).toEqual([70, 6, 2]);
  });

  it("does not repeat assignment alerts until the open one is acknowledged", async () => {
    const { store, engine } = setup(
      [{ name: "Revenue", rules: [revenueRule("over_100m", 90)] }],
      { hot: 75, autoAssign: 80 }
    );
    const lead = addLead(store, { annual_revenue: "over_100m" });

    await engine.calculateLeadScore(lead);
    await engine.calculateLeadScore(await reload(store, lead.id));

    const assignment = () => store.alerts.filter((a) => a.alert_type === "assignment_needed");
    expect(store.alerts.map((a) => a.alert_type)).toEqual([
      "hot_lead",
      "score_increase",
      "assignment_needed",
    ]);

    const first = assignment()[0];
    if (!first) throw new Error("assignment alert missing");
    await store.updateAlert(first.id, { is_acknowledged: true, acknowledged_by: "user-1" });

    await engine.calculateLeadScore(await reload(store, lead.id));
    expect(assignment()).toHaveLength(2);
  });

  it("logs notification failures without failing the score", async () => {
    const { store, engine, notify } = setup([{ name: "Revenue", rules: [revenueRule("x", 80)] }]);
    notify.mockRejectedValue(new Error("webhook down"));

    const result = await engine.calculateLeadScore(addLead(store, { annual_revenue: "x" }));
    expect(result.total).toBe(80);
    expect(notify).toHaveBeenCalledTimes(2);
  });

  it("feeds behavioral criteria from decayed activity points", async () => {
    const { store, engine } = setup([{ name: "Activity", category: "behavioral" }]);
    store.activityRules.push(makeActivityRule({ points_per_activity: 10, decay_days: 30, decay_rate: 0.1 }));
    const lead = addLead(store);
    store.activities.push(makeActivity({ lead_id: lead.id, created_at: daysAgo(40) }));

    const result = await engine.calculateLeadScore(lead);
    expect(result.behavioral).toBe(3);
    expect(result.total).toBe(3);
  });

  it("feeds engagement criteria from recency, frequency and quality", async () => {
    const { store, engine } = setup([{ name: "Engagement", category: "engagement", weight: 0.5 }]);
    const lead = addLead(store);
    store.activities.push(makeActivity({ lead_id: lead.id, created_at: daysAgo(2) }));

    const result = await engine.calculateLeadScore(lead);
    // recency 30 for a 2-day-old activity, halved by the weight
    expect(result.engagement).toBe(15);
  });
});

describe("bulkRecalculateScores", () => {
  it("scores active leads and skips failures", async () => {
    const { store, engine } = setup([{ name: "Revenue", rules: [revenueRule("x", 40)] }]);
    const ok = addLead(store, { annual_revenue: "x" });
    const broken = addLead(store, { annual_revenue: "x" });
    const inactive = addLead(store, { annual_revenue: "x", is_active: false });
    store.failingLeadIds.add(broken.id);

    expect(await engine.bulkRecalculateScores()).toBe(1);
    expect((await reload(store, ok.id)).score).toBe(40);
    expect((await reload(store, inactive.id)).score).toBe(0);
  });

  it("scores only the leads it is given", async () => {
    const { store, engine } = setup([{ name: "Revenue", rules: [revenueRule("x", 40)] }]);
    const a = addLead(store, { annual_revenue: "x" });
    addLead(store, { annual_revenue: "x" });

    expect(await engine.bulkRecalculateScores([a])).toBe(1);
    expect(store.history.map((h) => h.lead_id)).toEqual([a.id]);
    expect(store.history[0]?.triggered_by).toBe("bulk_recalculation");
  });

  it("keeps the caller's lead in step so rescoring it fires no new alerts", async () => {
    const { store, engine, notify } = setup(
      [{ name: "Revenue", rules: [revenueRule("x", 80)] }],
      { hot: 75, autoAssign: 90 }
    );
    const batch = [addLead(store, { annual_revenue: "x" })];

    await engine.bulkRecalculateScores(batch);
    await engine.bulkRecalculateScores(batch);

    expect(batch[0]?.score).toBe(80);
    expect(store.alerts.map((a) => a.alert_type)).toEqual(["hot_lead", "score_increase"]);
    expect(notify).toHaveBeenCalledTimes(2);
    expect(store.history.map((h) => h.score_change)).toEqual([80, 0]);
  });
});

describe("getScoreExplanation", () => {
  it("lists matching rules and configuration issues without persisting", async () => {
    const { store, engine } = setup([
      {
        name: "Company Size",
        weight: 1.5,
        maxScore: 25,
        rules: [
          { id: "r-big", field_name: "company_size", value: '"1000+"', points: 25, description: "1000+ employees" },
          { id: "r-mid", field_name: "company_size", value: '"51-200"', points: 10, description: "51-200 employees" },
          { id: "r-bad", field_name: "headcount", value: '"51-200"', points: 10 },
        ],
      },
    ]);
    const lead = addLead(store, { company_size: "51-200", score: 12 });
    store.activities.push(makeActivity({ lead_id: lead.id, created_at: daysAgo(2) }));

    const explanation = await engine.getScoreExplanation(lead);

    expect(explanation.totalScore).toBe(12);
    expect(explanation.criteria).toEqual([
      {
        name: "Company Size",
        category: "firmographic",
        score: 15,
        maxScore: 25,
        weight: 1.5,
        weightMultiplier: 1,
        matchingRules: [
          { ruleId: "r-mid", fieldName: "company_size", description: "51-200 employees", points: 10 },
        ],
      },
    ]);
    expect(explanation.engagementImpact).toBe(30);
    expect(explanation.behavioralImpact).toBe(0);
    expect(explanation.configurationIssues).toEqual([
      'Company Size: Rule r-bad: unknown lead field "headcount"',
    ]);
    expect(store.history).toHaveLength(0);
  });
});

describe("LeadScoringEngine.create", () => {
  it("bootstraps the starter profile once", async () => {
    const store = new MemoryScoringStore(() => NOW);

    const engine = await LeadScoringEngine.create(store, { clock: () => NOW });
    await LeadScoringEngine.create(store, { clock: () => NOW });

    expect(store.profiles).toHaveLength(1);
    expect(engine.profile.profile.name).toBe("Standard Lead Scoring");
    expect(engine.profile.criteria).toHaveLength(8);
    expect(engine.profile.configurationIssues).toEqual([]);
    expect(store.activityRules).toHaveLength(11);
  });

  it("switches to a newly saved default profile on reload", async () => {
    const { store, engine, config } = setup([{ name: "Revenue", rules: [revenueRule("x", 40)] }]);
    const replacement = makeProfileConfiguration(
      [{ name: "Revenue", rules: [revenueRule("x", 60)] }],
      { hot: 50 }
    );
    store.addConfiguration(replacement);
    const previous = store.profiles.find((p) => p.id === config.profile.id);
    if (!previous) throw new Error("profile missing");
    previous.is_default = false;

    const reloaded = await engine.reloadProfile();

    expect(reloaded.profile.id).toBe(replacement.profile.id);
    expect(engine.profile).toBe(reloaded);
    const result = await engine.calculateLeadScore(addLead(store, { annual_revenue: "x" }));
    expect(result.total).toBe(60);
    expect(store.history[0]?.profile_id).toBe(replacement.profile.id);
  });

  it("scores a lead with the starter profile", async () => {
    const store = new MemoryScoringStore(() => NOW);
    const notify = vi.fn().mockResolvedValue(undefined);
    const engine = await LeadScoringEngine.create(store, { notify, clock: () => NOW });

    const lead = addLead(store, {
      company_size: "11-50",
      annual_revenue: "1m_5m",
      budget_range: "10k_50k",
      timeline: "long_term",
      source: "website",
      company_name: "Acme",
      industry: "retail",
    });

    const result = await engine.calculateLeadScore(lead);

    expect(result.details).toEqual({
      "Company Size": 7.5,
      "Annual Revenue": 10,
      "Budget Range": 10,
      "Timeline Urgency": 6,
      "Lead Source Quality": 7,
      "Profile Completeness": 3.2,
      "Industry Match": 6,
      "Geographic Fit": 0,
    });
    expect(result.total).toBe(50);
    expect(store.history[0]).toMatchObject({
      firmographic_score: 24,
      demographic_score: 13,
      temporal_score: 6,
      source_score: 7,
    });
  });
});
