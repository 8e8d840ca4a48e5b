/**
 * @roster-outreach/shared – shared types and constants.
 *
 * Imported by the backend engine, the pipeline steps and the scripts.
 */

// Domain: campaigns & resolution
export type { CampaignTag, UserScope, UserType, MatchMethod } from "./domain/campaign";
export { CAMPAIGN_PRIORITY, FALLBACK_USER_TYPE } from "./domain/campaign";

// Domain: email validation
export type {
  TransportStatus,
  ValidationStatus,
  EmailValidationChecks,
  EmailValidationResult,
} from "./domain/validation";

// Output: CSV columns
export type { ValidationColumn, EnrichmentColumn, LoginColumn } from "./output/columns";
export {
  VALIDATION_COLUMNS,
  FILTER_COLUMNS,
  ENRICHMENT_COLUMNS,
  LOGIN_COLUMNS,
} from "./output/columns";
