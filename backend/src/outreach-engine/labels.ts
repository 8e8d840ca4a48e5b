import type { CustomField, FieldOption } from "./types";

// Custom-field values reference options either by option id (dropdown and
// label fields) or by orderindex (legacy single-select fields).
export type ValueId =
  | { kind: "numeric_index"; index: number }
  | { kind: "string_id"; id: string };

export function toValueIds(raw: unknown): ValueId[] {
  if (raw === null || raw === undefined) return [];
  const list = Array.isArray(raw) ? raw : [raw];
  const out: ValueId[] = [];
  for (const item of list) {
    if (typeof item === "number" && Number.isFinite(item)) {
      out.push({ kind: "numeric_index", index: item });
    } else if (typeof item === "string" && item) {
      out.push({ kind: "string_id", id: item });
    }
  }
  return out;
}

export function decodeLabels(field: CustomField | null | undefined, raw: unknown): string[] {
  if (!field) return [];
  const rawOptions = field.type_config?.options;
  const options = Array.isArray(rawOptions) ? rawOptions : [];
  if (!options.length) return [];

  const labels: string[] = [];
  for (const valueId of toValueIds(raw)) {
    const option = findOption(options, valueId);
    const label = option ? optionLabel(option) : "";
    if (label) labels.push(label);
  }
  return labels;
}

export function decodeField(fields: readonly CustomField[], name: string): string[] {
  const field = findField(fields, name);
  return field ? decodeLabels(field, field.value) : [];
}

export function findField(fields: readonly CustomField[], name: string): CustomField | undefined {
  return fields.find((field) => field?.name === name);
}

function findOption(options: readonly FieldOption[], valueId: ValueId): FieldOption | undefined {
  if (valueId.kind === "string_id") {
    return options.find((opt) => opt?.id !== null && opt?.id !== undefined && String(opt.id) === valueId.id);
  }

  const byOrder = options.find((opt) => toOrderIndex(opt?.orderindex) === valueId.index);
  if (byOrder) return byOrder;
  // Options without an orderindex are addressed by position.
  const positional = options[valueId.index];
  return positional && toOrderIndex(positional.orderindex) === null ? positional : undefined;
}

function toOrderIndex(value: unknown): number | null {
  if (typeof value === "number" && Number.isFinite(value)) return value;
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

function optionLabel(option: FieldOption): string {
  const label = typeof option.label === "string" ? option.label : "";
  if (label.trim()) return label.trim();
  return typeof option.name === "string" ? option.name.trim() : "";
}
