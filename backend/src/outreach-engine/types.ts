import type { CampaignTag, MatchMethod } from "@roster-outreach/shared";

// ── Raw task-store shapes ────────────────────────────────────────────────

export interface FieldOption {
  id?: string | number | null;
  orderindex?: number | string | null;
  label?: string | null;
  name?: string | null;
}

export interface CustomField {
  name?: string | null;
  value?: unknown;
  type_config?: {
    options?: FieldOption[] | null;
  } | null;
}

// Either column may arrive as a JSON string or already parsed, depending on
// how the warehouse sync stored it.
export interface RawTaskRow {
  id: string;
  name?: string | null;
  status?: unknown;
  custom_fields?: unknown;
}

export interface CompanyRow {
  id: string;
  name: string;
}

export interface ContactRow {
  contact_id: string;
  first_name: string;
  last_name: string;
}

// ── Decoded records ──────────────────────────────────────────────────────

export interface TaskRecord {
  readonly id: string;
  readonly name: string;
  readonly status: string;
  readonly customer_type: string;
  readonly services: readonly string[];
  readonly outreach_campaigns: readonly string[];
  readonly org_code_labels: readonly string[];
  readonly hubspot_url: string;
  readonly record_id: string;
  readonly company_name: string;
}

export type OrgCodeIndex = ReadonlyMap<string, TaskRecord>;

export interface NameIndexEntry {
  readonly original: string;
  readonly normalized: string;
  readonly task: TaskRecord;
}

export type NameIndex = readonly NameIndexEntry[];

export interface AliasTables {
  // Keys are stored trimmed and uppercased.
  orgCodes: Readonly<Record<string, string>>;
  corporationNames: Readonly<Record<string, string>>;
}

// ── Results ──────────────────────────────────────────────────────────────

export interface CorporationMatch {
  task: TaskRecord | null;
  method: MatchMethod;
}

export interface ResolutionResult extends CorporationMatch {
  campaign: CampaignTag | "";
}

export interface FacilityMatch {
  facility_task_id: string;
  facility_task_name: string;
  facility_corporation_task: string;
  facility_corporation_name: string;
  facility_hubspot_url: string;
  facility_hubspot_record_id: string;
  facility_hubspot_company: string;
}

export interface DirectoryMatch {
  company: CompanyRow;
  similarity: number;
}
