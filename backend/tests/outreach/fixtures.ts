import type { CustomField, RawTaskRow, TaskRecord } from "../../src/outreach-engine";

export function makeTask(overrides: Partial<TaskRecord> & { id: string }): TaskRecord {
  return {
    name: "",
    status: "active",
    customer_type: "view",
    services: [],
    outreach_campaigns: [],
    org_code_labels: [],
    hubspot_url: "",
    record_id: "",
    company_name: "",
    ...overrides,
  };
}

export function labelField(name: string, value: unknown, labels: Record<string, string>): CustomField {
  return {
    name,
    value,
    type_config: {
      options: Object.entries(labels).map(([id, label], orderindex) => ({ id, label, orderindex })),
    },
  };
}

export function dropdownField(name: string, value: unknown, names: string[]): CustomField {
  return {
    name,
    value,
    type_config: {
      options: names.map((optionName, orderindex) => ({
        id: `opt-${optionName.toLowerCase().replace(/\s+/g, "-")}`,
        name: optionName,
        orderindex,
      })),
    },
  };
}

export function rawTask(
  id: string,
  name: string,
  status: string,
  fields: CustomField[],
  encoding: "json" | "parsed" = "json"
): RawTaskRow {
  return encoding === "json"
    ? { id, name, status: JSON.stringify({ status }), custom_fields: JSON.stringify(fields) }
    : { id, name, status: { status }, custom_fields: fields };
}
