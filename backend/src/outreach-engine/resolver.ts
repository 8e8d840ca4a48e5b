import type { MatchMethod } from "@roster-outreach/shared";
import { findContainment, findExactName } from "./name-index";
import { normalizeName, normalizeOrgCode } from "./normalize";
import type { AliasTables, CorporationMatch, NameIndex, OrgCodeIndex, TaskRecord } from "./types";

export type CorporationQuery = {
  orgCode?: string | null;
  corporationName?: string | null;
};

const NO_MATCH: CorporationMatch = Object.freeze({ task: null, method: "" });

/**
 * Resolves a roster row's corporation to a task. Tiers run in order and the
 * first hit wins:
 *   1. manual org-code alias  -> alias(<canonical>)
 *   2. direct org-code lookup -> org_code
 *   3. manual name alias      -> name_alias(<CANONICAL>)
 *   4. name containment       -> name_fuzzy_match
 * Misses fall through; nothing here throws.
 */
export function resolveCorporation(
  query: CorporationQuery,
  aliases: AliasTables,
  nameIndex: NameIndex,
  orgIndex: OrgCodeIndex
): CorporationMatch {
  const orgCode = normalizeOrgCode(query.orgCode);
  const corpName = normalizeName(query.corporationName);

  if (orgCode) {
    const canonical = aliases.orgCodes[orgCode];
    if (canonical) {
      const task = orgIndex.get(normalizeOrgCode(canonical));
      if (task) return hit(task, `alias(${canonical})`);
    }

    const task = orgIndex.get(orgCode);
    if (task) return hit(task, "org_code");
  }

  if (corpName) {
    const canonical = aliases.corporationNames[corpName];
    if (canonical) {
      const target = normalizeName(canonical);
      const entry = findExactName(nameIndex, target);
      if (entry) return hit(entry.task, `name_alias(${target})`);
    }

    const entry = findContainment(nameIndex, corpName);
    if (entry) return hit(entry.task, "name_fuzzy_match");
  }

  return NO_MATCH;
}

function hit(task: TaskRecord, method: MatchMethod): CorporationMatch {
  return { task, method };
}
