import { classifyCampaign } from "./classifier";
import { buildNameIndex } from "./name-index";
import { buildOrgCodeIndex } from "./org-index";
import { resolveCorporation, type CorporationQuery } from "./resolver";
import type { AliasTables, NameIndex, OrgCodeIndex, ResolutionResult, TaskRecord } from "./types";

export type OutreachIndexes = {
  tasks: readonly TaskRecord[];
  orgIndex: OrgCodeIndex;
  nameIndex: NameIndex;
};

// Built once per run; read-only afterwards.
export function buildIndexes(tasks: readonly TaskRecord[]): OutreachIndexes {
  const frozen = Object.freeze([...tasks]);
  return Object.freeze({
    tasks: frozen,
    orgIndex: buildOrgCodeIndex(frozen),
    nameIndex: buildNameIndex(frozen),
  });
}

export function resolveAndClassify(
  query: CorporationQuery,
  aliases: AliasTables,
  indexes: OutreachIndexes
): ResolutionResult {
  const match = resolveCorporation(query, aliases, indexes.nameIndex, indexes.orgIndex);
  return { ...match, campaign: classifyCampaign(match.task) };
}

export function emptyAliases(): AliasTables {
  return { orgCodes: {}, corporationNames: {} };
}

// Alias keys are compared against trimmed, uppercased input.
export function normalizeAliases(raw: {
  orgCodes?: Record<string, string>;
  corporationNames?: Record<string, string>;
}): AliasTables {
  return {
    orgCodes: upperKeys(raw.orgCodes ?? {}),
    corporationNames: upperKeys(raw.corporationNames ?? {}),
  };
}

function upperKeys(record: Record<string, string>): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(record)) {
    const normalized = key.trim().toUpperCase();
    const target = typeof value === "string" ? value.trim() : "";
    if (normalized && target) out[normalized] = target;
  }
  return Object.freeze(out);
}
