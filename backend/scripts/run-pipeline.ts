import { createClient } from "@supabase/supabase-js";
import dotenv from "dotenv";
import {
  HttpEmailValidator,
  SupabaseWarehouseRepository,
  USAGE,
  configFromEnv,
  mergeOverrides,
  parseCliArgs,
  resolveConfig,
  run_pipeline,
  type CliArgs,
  type ConfigOverride,
  type PipelineDeps,
  type PipelineStep,
} from "../src/roster-pipeline";

// How to run:
// SUPABASE_URL=... SUPABASE_SERVICE_ROLE_KEY=... TASK_LIST_ID=... npm run pipeline -- [flags]
dotenv.config({ path: ".env.local" });
dotenv.config();

async function main() {
  let args: CliArgs;
  try {
    args = parseCliArgs(process.argv.slice(2));
  } catch (e) {
    console.error(e instanceof Error ? e.message : String(e));
    console.log(USAGE);
    process.exit(1);
  }

  const cliOverride: ConfigOverride = {};
  if (args.input) cliOverride.files = { input: args.input };
  if (args.login) cliOverride.files = { ...cliOverride.files, loginData: args.login };
  if (args.config) cliOverride.rulesPath = args.config;

  const override = mergeOverrides(configFromEnv(process.env), cliOverride);
  const cfg = resolveConfig(override);
  const steps: PipelineStep[] = args.step ? [args.step] : [1, 2, 3, 4];

  if (args.dryRun) {
    console.log("DRY RUN MODE - No changes will be made");
    console.log(`Steps to run: ${steps.join(", ")}`);
    console.log(`Skip API: ${args.skipApi}, Skip warehouse: ${args.skipWarehouse}`);
    console.log(`Config: ${JSON.stringify(cfg)}`);
    return;
  }

  const deps: PipelineDeps = {};
  if (steps.includes(1) && !args.skipApi) {
    deps.validator = new HttpEmailValidator({
      url: cfg.validator.url,
      timeoutMs: cfg.validator.timeoutMs,
      retries: cfg.validator.retries,
      retryDelayMs: cfg.validator.retryDelayMs,
    });
  }
  if (steps.includes(3) && !args.skipWarehouse) {
    deps.repository = new SupabaseWarehouseRepository(createWarehouseClient(), {
      pageSize: cfg.warehouse.pageSize,
      contactBatchSize: cfg.warehouse.contactBatchSize,
      contactConcurrency: cfg.warehouse.contactConcurrency,
    });
  }

  const result = await run_pipeline(
    {
      steps,
      skipValidation: args.skipApi,
      skipWarehouse: args.skipWarehouse,
      cfgOverride: override,
    },
    deps
  );

  if (!result.ok) {
    console.error("Pipeline failed. Check logs for details.");
    process.exit(1);
  }
}

function createWarehouseClient() {
  const url = requireEnv(process.env.SUPABASE_URL, "SUPABASE_URL");
  const key = requireEnv(process.env.SUPABASE_SERVICE_ROLE_KEY, "SUPABASE_SERVICE_ROLE_KEY");
  return createClient(url, key, {
    auth: { persistSession: false, autoRefreshToken: false },
  });
}

function requireEnv(value: string | undefined, name: string): string {
  if (!value) throw new Error(`Missing ${name} in env.`);
  return value;
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
