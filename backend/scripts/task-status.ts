import { createClient } from "@supabase/supabase-js";
import dotenv from "dotenv";
import {
  SupabaseWarehouseRepository,
  configFromEnv,
  formatTaskStatus,
  lookupTaskStatus,
  resolveConfig,
} from "../src/roster-pipeline";

// How to run:
// SUPABASE_URL=... SUPABASE_SERVICE_ROLE_KEY=... TASK_LIST_ID=... npm run task-status -- <ORG_CODE>
dotenv.config({ path: ".env.local" });
dotenv.config();

const USAGE = "Usage: npm run task-status -- <ORG_CODE>";

async function main() {
  const args = process.argv.slice(2);
  if (args.length !== 1 || args[0].startsWith("--")) {
    console.log(USAGE);
    process.exit(1);
  }
  const orgCode = args[0];

  const cfg = resolveConfig(configFromEnv(process.env));
  if (!cfg.warehouse.taskListId) throw new Error("Missing TASK_LIST_ID in env.");

  const repository = new SupabaseWarehouseRepository(createWarehouseClient(), {
    pageSize: cfg.warehouse.pageSize,
    contactBatchSize: cfg.warehouse.contactBatchSize,
    contactConcurrency: cfg.warehouse.contactConcurrency,
  });

  console.log(`[task-status] searching list ${cfg.warehouse.taskListId} for ${orgCode}`);
  const claims = await lookupTaskStatus(repository, cfg.warehouse.taskListId, orgCode);
  for (const line of formatTaskStatus(orgCode, claims)) console.log(line);
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
