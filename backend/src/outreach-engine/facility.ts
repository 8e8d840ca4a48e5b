import { findById, findContainment } from "./name-index";
import { normalizeName } from "./normalize";
import { bestMatch, normalizeForSimilarity } from "./similarity";
import type { CompanyRow, DirectoryMatch, FacilityMatch, NameIndex, TaskRecord } from "./types";

export const DEFAULT_MIN_SIMILARITY = 0.6;

export const EMPTY_FACILITY_MATCH: Readonly<FacilityMatch> = Object.freeze({
  facility_task_id: "",
  facility_task_name: "",
  facility_corporation_task: "",
  facility_corporation_name: "",
  facility_hubspot_url: "",
  facility_hubspot_record_id: "",
  facility_hubspot_company: "",
});

// Facility name -> best directory company. See createDirectoryMatcher.
export type DirectoryMatcher = (facilityName: string) => DirectoryMatch | null;

export type FacilityQuery = {
  facilityName: string;
  corporationTask: TaskRecord | null;
};

/**
 * Two independent lookups for a single facility name:
 * - task names: first containment hit in scan order (same test as the
 *   corporation resolver's last tier)
 * - company directory: highest similarity above the cutoff
 * A directory hit overrides the CRM id/company taken from the task. The two
 * may point at different organizations.
 */
export function resolveFacility(
  query: FacilityQuery,
  nameIndex: NameIndex,
  companies: readonly CompanyRow[],
  minSimilarity = DEFAULT_MIN_SIMILARITY,
  matchDirectory: DirectoryMatcher = (name) => matchCompanyDirectory(name, companies, minSimilarity)
): FacilityMatch {
  const facilityName = query.facilityName.trim();
  if (!facilityName) return { ...EMPTY_FACILITY_MATCH };

  const match: FacilityMatch = { ...EMPTY_FACILITY_MATCH };

  const entry = findContainment(nameIndex, normalizeName(facilityName));
  if (entry) {
    match.facility_task_id = entry.task.id;
    match.facility_task_name = entry.original;
    match.facility_hubspot_url = entry.task.hubspot_url;
    match.facility_hubspot_record_id = entry.task.record_id;
    match.facility_hubspot_company = entry.task.company_name;

    const corporationId = query.corporationTask?.id ?? "";
    if (corporationId) {
      match.facility_corporation_task = corporationId;
      match.facility_corporation_name =
        findById(nameIndex, corporationId)?.original ?? query.corporationTask?.name ?? "";
    }
  }

  const directory = matchDirectory(facilityName);
  if (directory) {
    match.facility_hubspot_record_id = directory.company.id;
    match.facility_hubspot_company = directory.company.name;
  }

  return match;
}

export function matchCompanyDirectory(
  facilityName: string,
  companies: readonly CompanyRow[],
  minSimilarity = DEFAULT_MIN_SIMILARITY
): DirectoryMatch | null {
  const best = bestMatch(facilityName, companies, (company) => company.name, minSimilarity);
  return best ? { company: best.item, similarity: best.score } : null;
}

// Memoized per distinct facility name (case-insensitive); rosters repeat the
// same facility across many rows.
export function createDirectoryMatcher(
  companies: readonly CompanyRow[],
  minSimilarity = DEFAULT_MIN_SIMILARITY
): DirectoryMatcher {
  const cache = new Map<string, DirectoryMatch | null>();
  return (facilityName) => {
    const key = normalizeForSimilarity(facilityName);
    const cached = cache.get(key);
    if (cached !== undefined) return cached;
    const match = matchCompanyDirectory(facilityName, companies, minSimilarity);
    cache.set(key, match);
    return match;
  };
}
