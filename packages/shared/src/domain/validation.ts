/**
 * Email-validation verdicts as returned by the local validation service,
 * plus the statuses the pipeline assigns when the service cannot answer.
 */

/**
 * Service-side statuses are passed through as-is (e.g. "VALID", "INVALID",
 * "RISKY"). The pipeline adds three of its own:
 * - UNKNOWN: service not reachable (connection refused / reset)
 * - TIMEOUT: no answer within the configured timeout
 * - ERROR:   any other failure (HTTP error, malformed body)
 */
export type TransportStatus = "UNKNOWN" | "TIMEOUT" | "ERROR";

export type ValidationStatus = TransportStatus | (string & {});

export interface EmailValidationChecks {
  syntax: boolean | null;
  domainExists: boolean | null;
  mxRecords: boolean | null;
  isDisposable: boolean | null;
  isRoleBased: boolean | null;
}

export interface EmailValidationResult {
  status: ValidationStatus;
  score: number;
  checks: EmailValidationChecks;
  /** Canonical address when the input is an alias (plus-addressing etc.). */
  aliasOf: string;
  /** Suggested correction for a likely typo in the domain. */
  typoSuggestion: string;
  /** Empty unless the pipeline had to assign a transport status. */
  error: string;
}
