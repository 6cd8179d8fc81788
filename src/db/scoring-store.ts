import type {
  ActivityScoringRuleTable,
  AlertType,
  CriteriaCategory,
  Lead,
  LeadActivity,
  LeadScoreHistory,
  LeadStatus,
  LeadUpdate,
  NewLeadActivity,
  NewLeadScoreHistory,
  NewScoringAlert,
  ScoringAlert,
  ScoringAlertTable,
  User,
  UserRole,
} from "./schemas/types.js";
import type { Updateable } from "kysely";

// ─── Scoring configuration records ─────────────────

export interface ScoringCriteria {
  id: string;
  name: string;
  category: CriteriaCategory;
  description: string;
  weight: number;
  max_score: number;
  is_active: boolean;
}

export interface ScoringRuleRecord {
  id: string;
  criteria_id: string;
  field_name: string;
  operator: string;
  value: string;
  points: number;
  description: string;
  is_active: boolean;
  sort_order: number;
}

export interface ProfileCriterion {
  criteria: ScoringCriteria;
  weight_multiplier: number;
  is_enabled: boolean;
  rules: ScoringRuleRecord[];
}

export interface ScoringProfileRecord {
  id: string;
  name: string;
  description: string;
  is_default: boolean;
  is_active: boolean;
  hot_lead_threshold: number;
  auto_assign_threshold: number;
}

export interface ProfileConfiguration {
  profile: ScoringProfileRecord;
  criteria: ProfileCriterion[];
}

export interface ActivityScoringRule {
  id: string;
  name: string;
  activity_type: ActivityScoringRuleTable["activity_type"];
  outcome: ActivityScoringRuleTable["outcome"];
  points_per_activity: number;
  max_points_per_day: number;
  decay_days: number;
  decay_rate: number;
  is_active: boolean;
}

// ─── Write inputs ──────────────────────────────────

export type ProfileInput = Omit<ScoringProfileRecord, "id"> & { id?: string };

export interface NewScoringRule {
  field_name: string;
  operator: string;
  value: string;
  points: number;
  description: string;
  sort_order: number;
}

export interface NewProfileCriterion {
  name: string;
  category: CriteriaCategory;
  description: string;
  weight: number;
  max_score: number;
  weight_multiplier: number;
  rules: NewScoringRule[];
}

export type NewActivityScoringRule = Omit<ActivityScoringRule, "id" | "is_active">;

export interface NewScoringConfiguration {
  profile: Omit<ProfileInput, "id" | "is_active">;
  criteria: NewProfileCriterion[];
  activityRules: NewActivityScoringRule[];
}

// ─── Query filters and patches ─────────────────────

export interface LeadFilter {
  isActive?: boolean;
  unassigned?: boolean;
  minScore?: number;
  isQualified?: boolean;
  statuses?: LeadStatus[];
  withoutFollowUp?: boolean;
}

export type LeadPatch = Pick<
  LeadUpdate,
  | "score"
  | "priority"
  | "assigned_to"
  | "is_qualified"
  | "next_follow_up_date"
  | "last_contact_date"
>;

export interface AlertFilter {
  leadId?: string;
  assignedTo?: string;
  unreadOnly?: boolean;
  unacknowledgedOnly?: boolean;
  limit?: number;
}

export type AlertPatch = Pick<
  Updateable<ScoringAlertTable>,
  "is_read" | "is_acknowledged" | "acknowledged_by" | "acknowledged_at"
>;

/**
 * Persistence boundary of the scoring subsystem.
 * Leads, activities and users belong to the CRM data layer; scoring only
 * reads them and writes the handful of columns listed in LeadPatch.
 */
export interface ScoringStore {
  // Configuration
  findDefaultProfile(): Promise<ProfileConfiguration | undefined>;
  findProfile(id: string): Promise<ProfileConfiguration | undefined>;
  createScoringConfiguration(
    config: NewScoringConfiguration
  ): Promise<ProfileConfiguration>;
  saveProfile(input: ProfileInput): Promise<ScoringProfileRecord>;
  resetScoringConfiguration(): Promise<void>;
  listActivityRules(): Promise<ActivityScoringRule[]>;

  // Leads and activities
  getLead(id: string): Promise<Lead | undefined>;
  listLeads(filter: LeadFilter): Promise<Lead[]>;
  updateLead(id: string, patch: LeadPatch): Promise<void>;
  listLeadActivities(leadId: string): Promise<LeadActivity[]>;
  insertActivity(activity: NewLeadActivity): Promise<LeadActivity>;
  listActiveUsers(roles?: UserRole[]): Promise<User[]>;

  // Score history
  insertScoreHistory(entry: NewLeadScoreHistory): Promise<LeadScoreHistory>;
  listScoreHistory(leadId: string, limit: number): Promise<LeadScoreHistory[]>;

  // Alerts
  insertAlert(alert: NewScoringAlert): Promise<ScoringAlert>;
  hasOpenAlert(leadId: string, alertType: AlertType): Promise<boolean>;
  getAlert(id: string): Promise<ScoringAlert | undefined>;
  listAlerts(filter: AlertFilter): Promise<ScoringAlert[]>;
  updateAlert(id: string, patch: AlertPatch): Promise<ScoringAlert | undefined>;
}
