// Engine
export { buildIndexes, resolveAndClassify, emptyAliases, normalizeAliases } from "./engine";
export type { OutreachIndexes } from "./engine";

// Types
export type {
  FieldOption,
  CustomField,
  RawTaskRow,
  CompanyRow,
  ContactRow,
  TaskRecord,
  OrgCodeIndex,
  NameIndexEntry,
  NameIndex,
  AliasTables,
  CorporationMatch,
  ResolutionResult,
  FacilityMatch,
  DirectoryMatch,
} from "./types";

// Decoding
export { decodeLabels, decodeField, findField, toValueIds } from "./labels";
export type { ValueId } from "./labels";
export {
  toTaskRecord,
  toTaskRecords,
  companyNameMap,
  parseStatus,
  parseCustomFields,
  FIELD_ORG_CODE,
  FIELD_CUSTOMER_TYPE,
  FIELD_SERVICES,
  FIELD_OUTREACH_CAMPAIGNS,
  FIELD_HUBSPOT_URL,
} from "./task-record";
export type { CompanyNames } from "./task-record";

// Indexes
export { buildOrgCodeIndex, findTasksByOrgCode } from "./org-index";
export type { OrgCodeClaim } from "./org-index";
export { buildNameIndex, findContainment, findExactName, findById } from "./name-index";

// Resolution & classification
export { resolveCorporation } from "./resolver";
export type { CorporationQuery } from "./resolver";
export {
  classifyCampaign,
  userTypeFor,
  isFacilityUserType,
  CAMPAIGN_RULES,
  LOSING_ACCESS_PATTERN,
} from "./classifier";
export {
  resolveFacility,
  matchCompanyDirectory,
  createDirectoryMatcher,
  EMPTY_FACILITY_MATCH,
  DEFAULT_MIN_SIMILARITY,
} from "./facility";
export type { FacilityQuery, DirectoryMatcher } from "./facility";

// Utilities
export { normalizeName, normalizeOrgCode, splitOrgCodes, containsEither, recordIdFromUrl } from "./normalize";
export {
  similarityRatio,
  normalizedRatio,
  indelDistance,
  bestMatch,
  lengthBound,
  charBound,
} from "./similarity";
export type { BestMatch, Scorer } from "./similarity";
