import { buildIndexes, companyNameMap, toTaskRecords } from "../outreach-engine";
import { loadOutreachRules, resolveConfig, type ConfigOverride, type OutreachRules, type PipelineConfig } from "./config";
import { readCsv, writeCsv } from "./csv";
import { collectEmails, enrichTable } from "./enrich";
import { filterTable } from "./filter";
import { appendLoginData, loadLoginHistory } from "./login";
import { verifyTable } from "./verify";
import { STEP_NAMES, type EmailValidator, type PipelineStep, type StepResult, type WarehouseRepository } from "./types";

export type PipelineRunOptions = {
  steps?: PipelineStep[];
  skipValidation?: boolean;
  skipWarehouse?: boolean;
  cfgOverride?: ConfigOverride;
  rules?: OutreachRules;
};

export type PipelineDeps = {
  validator?: EmailValidator;
  repository?: WarehouseRepository;
};

export type PipelineResult = {
  ok: boolean;
  steps: StepResult[];
  finalOutput: string;
};

const ALL_STEPS: PipelineStep[] = [1, 2, 3, 4];

export async function run_pipeline(
  options: PipelineRunOptions,
  deps: PipelineDeps
): Promise<PipelineResult> {
  const cfg = resolveConfig(options.cfgOverride);
  const steps = [...(options.steps ?? ALL_STEPS)].sort((a, b) => a - b);
  const results: StepResult[] = [];

  let rules = options.rules;
  const getRules = () => {
    if (!rules) rules = loadOutreachRules(cfg.rulesPath);
    return rules;
  };

  for (const step of steps) {
    banner(`STEP ${step}: ${STEP_NAMES[step]}`);

    if (step === 1 && options.skipValidation) {
      console.log("[pipeline] skipping email verification (--skip-api)");
      results.push({ step, ok: true, skipped: true });
      continue;
    }
    if (step === 3 && options.skipWarehouse) {
      console.log("[pipeline] skipping enrichment (--skip-warehouse)");
      results.push({ step, ok: true, skipped: true });
      continue;
    }

    const result = await runStep(step, cfg, getRules, deps);
    results.push(result);
    if (!result.ok) {
      console.error(`[pipeline] step ${step} failed: ${result.error}`);
      return { ok: false, steps: results, finalOutput: cfg.files.final };
    }
    console.log(`Step ${step} complete. Output: ${result.output}`);
  }

  banner("PIPELINE COMPLETE!");
  console.log(`Final output: ${cfg.files.final}`);
  return { ok: true, steps: results, finalOutput: cfg.files.final };
}

async function runStep(
  step: PipelineStep,
  cfg: PipelineConfig,
  getRules: () => OutreachRules,
  deps: PipelineDeps
): Promise<StepResult> {
  try {
    switch (step) {
      case 1:
        return await runVerifyStep(cfg, deps.validator);
      case 2:
        return runFilterStep(cfg, getRules());
      case 3:
        return await runEnrichStep(cfg, getRules(), deps.repository);
      case 4:
        return runLoginStep(cfg);
    }
  } catch (error) {
    return { step, ok: false, error: error instanceof Error ? error.message : String(error) };
  }
}

export async function runVerifyStep(cfg: PipelineConfig, validator: EmailValidator | undefined): Promise<StepResult> {
  if (!validator) throw new Error("No email validator configured.");
  const input = readCsv(cfg.files.input);
  console.log(`Loaded ${input.rows.length} rows to process.`);

  const { table, stats } = await verifyTable(input, validator, {
    maxWorkers: cfg.validator.maxWorkers,
    progressEvery: cfg.validator.progressEvery,
    onProgress: (done, total) => console.log(`Processed ${done}/${total}`),
  });

  const output = writeCsv(cfg.files.verified, table);
  console.log(`[verify] statuses ${JSON.stringify(stats)}`);
  return { step: 1, ok: true, rows: table.rows.length, output, stats };
}

export function runFilterStep(cfg: PipelineConfig, rules: OutreachRules): StepResult {
  const input = readCsv(cfg.files.verified);
  const { table, removedByOrgCode, removedByCorporation } = filterTable(input, rules.exclusions);
  const output = writeCsv(cfg.files.filtered, table);
  console.log(
    `Rows kept: ${table.rows.length}, removed by org code: ${removedByOrgCode}, removed by corporation: ${removedByCorporation}`
  );
  return {
    step: 2,
    ok: true,
    rows: table.rows.length,
    output,
    stats: { kept: table.rows.length, removedByOrgCode, removedByCorporation },
  };
}

export async function runEnrichStep(
  cfg: PipelineConfig,
  rules: OutreachRules,
  repository: WarehouseRepository | undefined
): Promise<StepResult> {
  if (!repository) throw new Error("No warehouse repository configured.");
  const input = readCsv(cfg.files.filtered);
  const emails = collectEmails(input.rows);
  console.log(`Collected ${emails.length} unique emails for contact lookup`);

  const [rawTasks, companies, contacts] = await Promise.all([
    repository.loadTasks(cfg.warehouse.taskListId),
    repository.loadCompanies(),
    repository.loadContacts(emails),
  ]);

  const indexes = buildIndexes(toTaskRecords(rawTasks, companyNameMap(companies)));
  console.log(
    `Built lookup data: ${indexes.orgIndex.size} org codes, ${indexes.nameIndex.length} task names`
  );

  const { table, stats } = enrichTable(input, {
    aliases: rules.aliases,
    indexes,
    companies,
    contacts,
    minSimilarity: cfg.facility.minSimilarity,
  });

  const output = writeCsv(cfg.files.enriched, table);
  console.log(
    `Matches by Alias: ${stats.alias}, Org Code: ${stats.orgCode}, Name Alias: ${stats.nameAlias}, Fuzzy: ${stats.nameFuzzy}, Unmatched: ${stats.unmatched}`
  );
  console.log(`Contacts matched: ${stats.contacts}, facility matches: ${stats.facilityMatches}`);
  return { step: 3, ok: true, rows: table.rows.length, output, stats };
}

export function runLoginStep(cfg: PipelineConfig): StepResult {
  const input = readCsv(cfg.files.enriched);
  const history = loadLoginHistory(readCsv(cfg.files.loginData));
  console.log(`Loaded ${history.size} login records (excluding totals)`);

  const { table, matched } = appendLoginData(input, history);
  const output = writeCsv(cfg.files.final, table);
  console.log(`Total rows: ${table.rows.length}, Matched with login data: ${matched}`);
  return { step: 4, ok: true, rows: table.rows.length, output, stats: { matched } };
}

function banner(title: string) {
  console.log("=".repeat(50));
  console.log(title);
  console.log("=".repeat(50));
}
