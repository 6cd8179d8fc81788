import type { Lead } from "../db/schemas/types.js";

export type FieldValue = string | number | boolean | null;

export type FieldAccessor = (lead: Lead, now: Date) => FieldValue;

const DAY_MS = 86_400_000;

// Closed set of lead attributes that scoring rules may reference
const LEAD_FIELDS = {
  first_name: (lead) => lead.first_name,
  last_name: (lead) => lead.last_name,
  email: (lead) => lead.email,
  phone_number: (lead) => lead.phone_number,
  company_name: (lead) => lead.company_name,
  job_title: (lead) => lead.job_title,
  city: (lead) => lead.city,
  territory: (lead) => lead.territory,
  industry: (lead) => lead.industry,
  company_size: (lead) => lead.company_size,
  annual_revenue: (lead) => lead.annual_revenue,
  budget_range: (lead) => lead.budget_range,
  timeline: (lead) => lead.timeline,
  source: (lead) => lead.source,
  status: (lead) => lead.status,
  priority: (lead) => lead.priority,
  score: (lead) => lead.score,
  is_qualified: (lead) => lead.is_qualified,
  assigned_to: (lead) => lead.assigned_to,
  days_as_lead: (lead, now) =>
    Math.floor((now.getTime() - lead.created_at.getTime()) / DAY_MS),
} satisfies Record<string, FieldAccessor>;

export type LeadFieldName = keyof typeof LEAD_FIELDS;

export function isLeadFieldName(name: string): name is LeadFieldName {
  return Object.prototype.hasOwnProperty.call(LEAD_FIELDS, name);
}

/**
 * Resolve a configured field name to its accessor.
 * Returns undefined for names outside the registry.
 */
export function resolveLeadField(name: string): FieldAccessor | undefined {
  if (!isLeadFieldName(name)) return undefined;
  const accessor: FieldAccessor = LEAD_FIELDS[name];
  return accessor;
}
