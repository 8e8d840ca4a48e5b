import type { EmailValidationResult } from "@roster-outreach/shared";
import type { CompanyRow, ContactRow, RawTaskRow } from "../outreach-engine";

export type PipelineStep = 1 | 2 | 3 | 4;

export const STEP_NAMES: Record<PipelineStep, string> = {
  1: "Email Verification",
  2: "Filtering",
  3: "Enrichment",
  4: "Login Data",
};

export type StepResult = {
  step: PipelineStep;
  ok: boolean;
  skipped?: boolean;
  rows?: number;
  output?: string;
  error?: string;
  stats?: Record<string, number>;
};

// Read access to the warehouse tables synced from the task tracker and CRM.
export interface WarehouseRepository {
  loadTasks(listId: string): Promise<RawTaskRow[]>;
  loadCompanies(): Promise<CompanyRow[]>;
  // Keys are lowercased emails. Batches that fail are skipped, not thrown.
  loadContacts(emails: readonly string[]): Promise<Map<string, ContactRow>>;
}

export interface EmailValidator {
  // Never rejects: transport failures come back as UNKNOWN / TIMEOUT / ERROR.
  validate(email: string): Promise<EmailValidationResult>;
}

// Input columns the steps rely on.
export const COL_EMAIL = "email";
export const COL_ORG_CODE = "org_code";
export const COL_CORPORATION = "covr_corporation";
export const COL_FACILITIES = "facilities";
export const COL_LAST_NAME = "last_name";
