import type {
  ColumnType,
  Generated,
  Insertable,
  Selectable,
  Updateable,
} from "kysely";

// NUMERIC columns come back from pg as strings
type Numeric = ColumnType<string, number | string, number | string>;

// ─── User ──────────────────────────────────────────
export type UserRole = "admin" | "manager" | "supervisor" | "salesperson";

export interface UserTable {
  id: Generated<string>;
  username: string;
  full_name: string;
  role: UserRole;
  is_active: Generated<boolean>;
  created_at: Generated<Date>;
}

export type User = Selectable<UserTable>;
export type NewUser = Insertable<UserTable>;

// ─── Lead ──────────────────────────────────────────
export type LeadStatus =
  | "new"
  | "contacted"
  | "qualified"
  | "proposal_sent"
  | "negotiating"
  | "converted"
  | "lost"
  | "unqualified";

export type LeadPriority = "low" | "medium" | "high" | "hot";

export type LeadSourceType =
  | "website"
  | "social_media"
  | "referral"
  | "cold_calling"
  | "email_marketing"
  | "advertising"
  | "trade_show"
  | "webinar"
  | "content_marketing"
  | "seo"
  | "paid_search"
  | "partner"
  | "other";

export interface LeadTable {
  id: Generated<string>;

  // Contact
  first_name: string;
  last_name: string;
  email: string;
  phone_number: string | null;
  company_name: string | null;
  job_title: string | null;

  // Location
  city: string | null;
  territory: string | null;

  // Business profile
  industry: string | null;
  company_size: string | null;
  annual_revenue: string | null;
  budget_range: string | null;
  timeline: string | null;
  source: LeadSourceType | null;

  // Management
  status: Generated<LeadStatus>;
  priority: Generated<LeadPriority>;
  assigned_to: string | null;

  // Scoring
  score: Generated<number>;
  is_qualified: Generated<boolean>;
  is_active: Generated<boolean>;

  // Follow-up
  last_contact_date: Date | null;
  next_follow_up_date: Date | null;

  // Timestamps
  created_at: Generated<Date>;
  updated_at: Generated<Date>;
}

export type Lead = Selectable<LeadTable>;
export type NewLead = Insertable<LeadTable>;
export type LeadUpdate = Updateable<LeadTable>;

// ─── Lead Activity ─────────────────────────────────
export type ActivityType =
  | "call"
  | "email"
  | "meeting"
  | "demo"
  | "proposal"
  | "follow_up"
  | "research"
  | "note"
  | "status_change";

export type ActivityOutcome =
  | "successful"
  | "no_response"
  | "interested"
  | "not_interested"
  | "follow_up_needed"
  | "meeting_scheduled"
  | "proposal_requested";

export interface LeadActivityTable {
  id: Generated<string>;
  lead_id: string;
  activity_type: ActivityType;
  outcome: ActivityOutcome | "";
  title: string;
  description: string;
  performed_by: string | null;
  created_at: Generated<Date>;
}

export type LeadActivity = Selectable<LeadActivityTable>;
export type NewLeadActivity = Insertable<LeadActivityTable>;

// ─── Scoring Criteria ──────────────────────────────
export type CriteriaCategory =
  | "demographic"
  | "firmographic"
  | "behavioral"
  | "engagement"
  | "source"
  | "temporal";

export interface ScoringCriteriaTable {
  id: Generated<string>;
  name: string;
  category: CriteriaCategory;
  description: string;
  weight: Numeric;
  max_score: number;
  is_active: Generated<boolean>;
  created_at: Generated<Date>;
  updated_at: Generated<Date>;
}

// ─── Scoring Rule ──────────────────────────────────
export interface ScoringRuleTable {
  id: Generated<string>;
  criteria_id: string;
  field_name: string;
  operator: string;
  // JSON-serialized comparison value
  value: string;
  points: number;
  description: string;
  is_active: Generated<boolean>;
  sort_order: Generated<number>;
  created_at: Generated<Date>;
}

// ─── Scoring Profile ───────────────────────────────
export interface LeadScoringProfileTable {
  id: Generated<string>;
  name: string;
  description: string;
  is_default: Generated<boolean>;
  is_active: Generated<boolean>;
  hot_lead_threshold: Generated<number>;
  auto_assign_threshold: Generated<number>;
  created_at: Generated<Date>;
  updated_at: Generated<Date>;
}

export interface ProfileCriteriaTable {
  id: Generated<string>;
  profile_id: string;
  criteria_id: string;
  weight_multiplier: Numeric;
  is_enabled: Generated<boolean>;
}

// ─── Activity Scoring Rule ─────────────────────────
export interface ActivityScoringRuleTable {
  id: Generated<string>;
  name: string;
  activity_type: ActivityType | "";
  outcome: ActivityOutcome | "";
  points_per_activity: number;
  max_points_per_day: number;
  decay_days: number;
  decay_rate: Numeric;
  is_active: Generated<boolean>;
  created_at: Generated<Date>;
}

// ─── Score History ─────────────────────────────────
export interface LeadScoreHistoryTable {
  id: Generated<string>;
  lead_id: string;
  total_score: number;
  demographic_score: number;
  firmographic_score: number;
  behavioral_score: number;
  engagement_score: number;
  source_score: number;
  temporal_score: number;
  profile_id: string | null;
  details: Record<string, number>;
  score_change: number;
  change_reason: string;
  triggered_by: string;
  created_at: Generated<Date>;
}

export type LeadScoreHistory = Selectable<LeadScoreHistoryTable>;
export type NewLeadScoreHistory = Insertable<LeadScoreHistoryTable>;

// ─── Scoring Alert ─────────────────────────────────
export type AlertType =
  | "hot_lead"
  | "score_increase"
  | "score_decrease"
  | "threshold_reached"
  | "assignment_needed";

export type AlertPriority = "low" | "medium" | "high" | "urgent";

export interface ScoringAlertTable {
  id: Generated<string>;
  lead_id: string;
  alert_type: AlertType;
  priority: AlertPriority;
  title: string;
  message: string;
  threshold_value: number | null;
  current_score: number;
  assigned_to: string | null;
  notify_supervisors: Generated<boolean>;
  is_read: Generated<boolean>;
  is_acknowledged: Generated<boolean>;
  acknowledged_by: string | null;
  acknowledged_at: Date | null;
  created_at: Generated<Date>;
}

export type ScoringAlert = Selectable<ScoringAlertTable>;
export type NewScoringAlert = Insertable<ScoringAlertTable>;

// ─── Database ──────────────────────────────────────
export interface Database {
  users: UserTable;
  leads: LeadTable;
  lead_activities: LeadActivityTable;
  scoring_criteria: ScoringCriteriaTable;
  scoring_rules: ScoringRuleTable;
  lead_scoring_profiles: LeadScoringProfileTable;
  profile_criteria: ProfileCriteriaTable;
  activity_scoring_rules: ActivityScoringRuleTable;
  lead_score_history: LeadScoreHistoryTable;
  scoring_alerts: ScoringAlertTable;
}
