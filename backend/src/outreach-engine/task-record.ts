import { decodeField, findField } from "./labels";
import { lowerLabels, recordIdFromUrl } from "./normalize";
import type { CompanyRow, CustomField, RawTaskRow, TaskRecord } from "./types";

export const FIELD_ORG_CODE = "Org Code";
export const FIELD_CUSTOMER_TYPE = "Customer Type";
export const FIELD_SERVICES = "Services";
export const FIELD_OUTREACH_CAMPAIGNS = "Outreach Campaign";
export const FIELD_HUBSPOT_URL = "Hubspot URL";

export type CompanyNames = ReadonlyMap<string, string>;

export function companyNameMap(companies: readonly CompanyRow[]): CompanyNames {
  const map = new Map<string, string>();
  for (const company of companies) {
    if (!company.id || !company.name) continue;
    map.set(String(company.id), company.name.trim());
  }
  return map;
}

export function toTaskRecord(row: RawTaskRow, companies: CompanyNames): TaskRecord {
  const fields = parseCustomFields(row.custom_fields);

  const customerType = decodeField(fields, FIELD_CUSTOMER_TYPE)[0] ?? "";
  const hubspotUrl = readUrlField(findField(fields, FIELD_HUBSPOT_URL));
  const recordId = recordIdFromUrl(hubspotUrl);

  return Object.freeze({
    id: String(row.id),
    name: typeof row.name === "string" ? row.name.trim() : "",
    status: parseStatus(row.status),
    customer_type: customerType.trim().toLowerCase(),
    services: Object.freeze(lowerLabels(decodeField(fields, FIELD_SERVICES))),
    outreach_campaigns: Object.freeze(lowerLabels(decodeField(fields, FIELD_OUTREACH_CAMPAIGNS))),
    org_code_labels: Object.freeze(decodeField(fields, FIELD_ORG_CODE)),
    hubspot_url: hubspotUrl,
    record_id: recordId,
    company_name: recordId ? companies.get(recordId) ?? "" : "",
  });
}

export function toTaskRecords(rows: readonly RawTaskRow[], companies: CompanyNames): TaskRecord[] {
  return rows.filter((row) => row && row.id !== undefined && row.id !== null).map((row) => toTaskRecord(row, companies));
}

export function parseStatus(raw: unknown): string {
  const value = typeof raw === "string" ? parseJson(raw) : raw;
  if (value && typeof value === "object" && "status" in value) {
    const status = value.status;
    if (typeof status === "string" && status.trim()) return status.trim().toLowerCase();
  }
  return "unknown";
}

export function parseCustomFields(raw: unknown): CustomField[] {
  const value = typeof raw === "string" ? parseJson(raw) : raw;
  if (!Array.isArray(value)) return [];
  return value.filter(isCustomField);
}

function isCustomField(value: unknown): value is CustomField {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

function readUrlField(field: CustomField | undefined): string {
  if (!field) return "";
  const value = Array.isArray(field.value) ? field.value[0] : field.value;
  return typeof value === "string" ? value.trim() : "";
}

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return null;
  }
}
