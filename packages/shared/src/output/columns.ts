/**
 * Column names of the CSV files written by the pipeline steps.
 * Input columns are kept in their original order; these are appended.
 */

export const VALIDATION_COLUMNS = [
  "validation_status",
  "validation_score",
  "syntax",
  "domain_exists",
  "mx_records",
  "is_disposable",
  "is_role_based",
  "alias_of",
  "typo_suggestion",
  "validation_error",
] as const;

export const FILTER_COLUMNS = ["job title"] as const;

export const ENRICHMENT_COLUMNS = [
  "task_id",
  "task_status",
  "customer_type",
  "services",
  "outreach_campaigns",
  "hubspot_url",
  "hubspot corporation record id",
  "hubspot corporation name",
  "campaign",
  "View User type",
  "facility_task_id",
  "facility_task_name",
  "facility_corporation_task",
  "facility_corporation_name",
  "facility_hubspot_url",
  "facility_hubspot_record_id",
  "facility_hubspot_company",
  "hubspot_contact_id",
  "hubspot_contact_first_name",
  "hubspot_contact_last_name",
  "match_method",
] as const;

export const LOGIN_COLUMNS = ["count_of_views", "last_login"] as const;

export type ValidationColumn = (typeof VALIDATION_COLUMNS)[number];
export type EnrichmentColumn = (typeof ENRICHMENT_COLUMNS)[number];
export type LoginColumn = (typeof LOGIN_COLUMNS)[number];
