// Pipeline
export { run_pipeline, runVerifyStep, runFilterStep, runEnrichStep, runLoginStep } from "./pipeline";
export type { PipelineRunOptions, PipelineDeps, PipelineResult } from "./pipeline";

// Types
export type { PipelineStep, StepResult, WarehouseRepository, EmailValidator } from "./types";
export { STEP_NAMES } from "./types";

// Config
export {
  resolveConfig,
  configFromEnv,
  mergeOverrides,
  loadOutreachRules,
  parseOutreachRules,
  DEFAULT_RULES_PATH,
} from "./config";
export type { PipelineConfig, ConfigOverride, OutreachRules } from "./config";

// Steps
export { verifyTable, validationColumns } from "./verify";
export { filterTable, splitJobTitle } from "./filter";
export { enrichTable, enrichRow, collectEmails } from "./enrich";
export type { EnrichContext, EnrichStats } from "./enrich";
export { loadLoginHistory, appendLoginData } from "./login";

// Collaborators
export { HttpEmailValidator, parseValidationBody, classifyTransportError } from "./validator";
export type { HttpEmailValidatorOptions, FetchLike } from "./validator";
export { SupabaseWarehouseRepository, fetchAllPages, fetchContactBatches, chunk } from "./supabase-repository";
export type { WarehouseOptions } from "./supabase-repository";
export { parseCsv, formatCsv, readCsv, writeCsv, appendColumns, findColumn } from "./csv";
export type { CsvRow, CsvTable } from "./csv";
export { parseCliArgs, USAGE } from "./cli-args";
export type { CliArgs } from "./cli-args";
export { lookupTaskStatus, formatTaskStatus } from "./task-status";
