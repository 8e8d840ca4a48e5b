import { ENRICHMENT_COLUMNS, type EnrichmentColumn } from "@roster-outreach/shared";
import {
  EMPTY_FACILITY_MATCH,
  createDirectoryMatcher,
  isFacilityUserType,
  resolveAndClassify,
  resolveFacility,
  userTypeFor,
  type AliasTables,
  type CompanyRow,
  type ContactRow,
  type DirectoryMatcher,
  type FacilityMatch,
  type OutreachIndexes,
} from "../outreach-engine";
import { appendColumns, cell, type CsvRow, type CsvTable } from "./csv";
import { COL_CORPORATION, COL_EMAIL, COL_FACILITIES, COL_ORG_CODE } from "./types";

export type EnrichContext = {
  aliases: AliasTables;
  indexes: OutreachIndexes;
  companies: readonly CompanyRow[];
  contacts: ReadonlyMap<string, ContactRow>;
  minSimilarity: number;
};

export type EnrichStats = {
  rows: number;
  alias: number;
  orgCode: number;
  nameAlias: number;
  nameFuzzy: number;
  unmatched: number;
  campaigns: number;
  facilityMatches: number;
  contacts: number;
};

type EnrichmentValues = Record<EnrichmentColumn, string>;

export function enrichTable(table: CsvTable, ctx: EnrichContext): { table: CsvTable; stats: EnrichStats } {
  const stats: EnrichStats = {
    rows: 0,
    alias: 0,
    orgCode: 0,
    nameAlias: 0,
    nameFuzzy: 0,
    unmatched: 0,
    campaigns: 0,
    facilityMatches: 0,
    contacts: 0,
  };

  const matchDirectory = createDirectoryMatcher(ctx.companies, ctx.minSimilarity);
  const rows = table.rows.map((row) => {
    const values = enrichRow(row, ctx, matchDirectory);
    countRow(stats, values);
    return { ...row, ...values };
  });

  return { table: { fields: appendColumns(table.fields, ENRICHMENT_COLUMNS), rows }, stats };
}

export function enrichRow(
  row: CsvRow,
  ctx: EnrichContext,
  matchDirectory: DirectoryMatcher = createDirectoryMatcher(ctx.companies, ctx.minSimilarity)
): EnrichmentValues {
  const resolution = resolveAndClassify(
    { orgCode: cell(row, COL_ORG_CODE), corporationName: cell(row, COL_CORPORATION) },
    ctx.aliases,
    ctx.indexes
  );
  const { task, campaign } = resolution;
  const facilities = cell(row, COL_FACILITIES);
  const userType = userTypeFor(campaign, facilities);

  const facility: FacilityMatch =
    campaign && isFacilityUserType(userType)
      ? resolveFacility(
          { facilityName: facilities, corporationTask: task },
          ctx.indexes.nameIndex,
          ctx.companies,
          ctx.minSimilarity,
          matchDirectory
        )
      : { ...EMPTY_FACILITY_MATCH };

  const contact = ctx.contacts.get(cell(row, COL_EMAIL).toLowerCase());

  return {
    task_id: task?.id ?? "",
    task_status: task?.status ?? "",
    customer_type: task?.customer_type ?? "",
    services: task ? task.services.join(", ") : "",
    outreach_campaigns: task ? task.outreach_campaigns.join(", ") : "",
    hubspot_url: task?.hubspot_url ?? "",
    "hubspot corporation record id": task?.record_id ?? "",
    "hubspot corporation name": task?.company_name ?? "",
    campaign,
    "View User type": userType,
    ...facility,
    hubspot_contact_id: contact?.contact_id ?? "",
    hubspot_contact_first_name: contact?.first_name ?? "",
    hubspot_contact_last_name: contact?.last_name ?? "",
    match_method: resolution.method,
  };
}

export function collectEmails(rows: readonly CsvRow[]): string[] {
  const emails = new Set<string>();
  for (const row of rows) {
    const email = cell(row, COL_EMAIL).toLowerCase();
    if (email) emails.add(email);
  }
  return [...emails];
}

function countRow(stats: EnrichStats, values: EnrichmentValues) {
  stats.rows += 1;
  const method = values.match_method;
  if (method.startsWith("alias(")) stats.alias += 1;
  else if (method === "org_code") stats.orgCode += 1;
  else if (method.startsWith("name_alias(")) stats.nameAlias += 1;
  else if (method === "name_fuzzy_match") stats.nameFuzzy += 1;
  else stats.unmatched += 1;

  if (values.campaign) stats.campaigns += 1;
  if (values.facility_task_id || values.facility_hubspot_record_id) stats.facilityMatches += 1;
  if (values.hubspot_contact_id) stats.contacts += 1;
}
