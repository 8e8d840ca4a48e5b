import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { normalizeAliases } from "../outreach-engine";
import type { AliasTables } from "../outreach-engine";

export type PipelineConfig = {
  files: {
    input: string;
    loginData: string;
    verified: string;
    filtered: string;
    enriched: string;
    final: string;
  };
  validator: {
    url: string;
    maxWorkers: number;
    timeoutMs: number;
    retries: number;
    retryDelayMs: number;
    progressEvery: number;
  };
  warehouse: {
    taskListId: string;
    pageSize: number;
    contactBatchSize: number;
    contactConcurrency: number;
  };
  facility: {
    minSimilarity: number;
  };
  rulesPath: string;
};

export type ConfigOverride = {
  [K in keyof PipelineConfig]?: PipelineConfig[K] extends object
    ? Partial<PipelineConfig[K]>
    : PipelineConfig[K];
};

export type OutreachRules = {
  aliases: AliasTables;
  exclusions: {
    orgCodes: ReadonlySet<string>;
    corporations: ReadonlySet<string>;
  };
};

export const DEFAULT_RULES_PATH = fileURLToPath(
  new URL("../../config/outreach.json", import.meta.url)
);

const DEFAULT_CONFIG: PipelineConfig = {
  files: {
    input: "data/roster.csv",
    loginData: "data/login-history.csv",
    verified: "output/verified_emails.csv",
    filtered: "output/filtered_roster.csv",
    enriched: "output/enriched_roster.csv",
    final: "output/final_roster.csv",
  },
  validator: {
    url: "http://localhost:8080/api/validate",
    maxWorkers: 20,
    timeoutMs: 10_000,
    retries: 1,
    retryDelayMs: 250,
    progressEvery: 100,
  },
  warehouse: {
    taskListId: "",
    pageSize: 1000,
    contactBatchSize: 100,
    contactConcurrency: 4,
  },
  facility: {
    minSimilarity: 0.6,
  },
  rulesPath: DEFAULT_RULES_PATH,
};

export function resolveConfig(override?: ConfigOverride): PipelineConfig {
  if (!override) return cloneDefaults();

  const base = cloneDefaults();
  return {
    files: { ...base.files, ...(override.files ?? {}) },
    validator: { ...base.validator, ...(override.validator ?? {}) },
    warehouse: { ...base.warehouse, ...(override.warehouse ?? {}) },
    facility: { ...base.facility, ...(override.facility ?? {}) },
    rulesPath: override.rulesPath ?? base.rulesPath,
  };
}

// Reads the variables the CLI documents in .env.example. Unset or invalid
// values leave the defaults in place.
export function configFromEnv(env: NodeJS.ProcessEnv): ConfigOverride {
  const override: ConfigOverride = {};

  const validator: Partial<PipelineConfig["validator"]> = {};
  if (env.EMAIL_VALIDATOR_URL) validator.url = env.EMAIL_VALIDATOR_URL;
  const workers = toPositiveInt(env.EMAIL_VALIDATOR_WORKERS);
  if (workers) validator.maxWorkers = workers;
  const timeout = toPositiveInt(env.EMAIL_VALIDATOR_TIMEOUT_MS);
  if (timeout) validator.timeoutMs = timeout;
  if (Object.keys(validator).length) override.validator = validator;

  if (env.TASK_LIST_ID) override.warehouse = { taskListId: env.TASK_LIST_ID };
  if (env.OUTREACH_RULES_PATH) override.rulesPath = env.OUTREACH_RULES_PATH;

  return override;
}

export function mergeOverrides(...overrides: ConfigOverride[]): ConfigOverride {
  const merged: ConfigOverride = {};
  for (const o of overrides) {
    if (o.files) merged.files = { ...merged.files, ...o.files };
    if (o.validator) merged.validator = { ...merged.validator, ...o.validator };
    if (o.warehouse) merged.warehouse = { ...merged.warehouse, ...o.warehouse };
    if (o.facility) merged.facility = { ...merged.facility, ...o.facility };
    if (o.rulesPath) merged.rulesPath = o.rulesPath;
  }
  return merged;
}

export function loadOutreachRules(rulesPath: string): OutreachRules {
  const resolved = path.resolve(rulesPath);
  if (!fs.existsSync(resolved)) throw new Error(`Outreach rules not found: ${resolved}`);

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(resolved, "utf8"));
  } catch {
    throw new Error(`Invalid JSON in outreach rules: ${resolved}`);
  }

  return parseOutreachRules(parsed, resolved);
}

export function parseOutreachRules(value: unknown, source = "outreach rules"): OutreachRules {
  if (!isRecord(value)) throw new Error(`Outreach rules must be an object: ${source}`);

  const aliases = value.aliases ?? {};
  const exclusions = value.exclusions ?? {};
  if (!isRecord(aliases)) throw new Error(`aliases must be an object: ${source}`);
  if (!isRecord(exclusions)) throw new Error(`exclusions must be an object: ${source}`);

  return {
    aliases: normalizeAliases({
      orgCodes: stringRecord(aliases.orgCodes, "aliases.orgCodes", source),
      corporationNames: stringRecord(aliases.corporationNames, "aliases.corporationNames", source),
    }),
    exclusions: {
      orgCodes: new Set(
        stringList(exclusions.orgCodes, "exclusions.orgCodes", source).map((code) => code.trim())
      ),
      corporations: new Set(
        stringList(exclusions.corporations, "exclusions.corporations", source).map((name) =>
          name.trim().toUpperCase()
        )
      ),
    },
  };
}

function cloneDefaults(): PipelineConfig {
  return {
    files: { ...DEFAULT_CONFIG.files },
    validator: { ...DEFAULT_CONFIG.validator },
    warehouse: { ...DEFAULT_CONFIG.warehouse },
    facility: { ...DEFAULT_CONFIG.facility },
    rulesPath: DEFAULT_CONFIG.rulesPath,
  };
}

function stringRecord(value: unknown, key: string, source: string): Record<string, string> {
  if (value === undefined) return {};
  if (!isRecord(value)) throw new Error(`${key} must be an object: ${source}`);
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(value)) {
    if (typeof v !== "string") throw new Error(`${key}.${k} must be a string: ${source}`);
    out[k] = v;
  }
  return out;
}

function stringList(value: unknown, key: string, source: string): string[] {
  if (value === undefined) return [];
  if (!Array.isArray(value)) throw new Error(`${key} must be a list of strings: ${source}`);
  const items = value.filter((item): item is string => typeof item === "string");
  if (items.length !== value.length) throw new Error(`${key} must be a list of strings: ${source}`);
  return items;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

function toPositiveInt(value: string | undefined): number | null {
  if (!value) return null;
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : null;
}
