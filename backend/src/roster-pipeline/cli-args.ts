import type { PipelineStep } from "./types";

export type CliArgs = {
  step: PipelineStep | null;
  skipApi: boolean;
  skipWarehouse: boolean;
  dryRun: boolean;
  input: string | null;
  login: string | null;
  config: string | null;
};

export const USAGE =
  "Usage: npm run pipeline -- [--step 1|2|3|4] [--skip-api] [--skip-warehouse] [--dry-run] [--input <csv>] [--login <csv>] [--config <json>]";

const VALUE_FLAGS = new Set(["--step", "--input", "--login", "--config"]);

export function parseCliArgs(argv: readonly string[]): CliArgs {
  const args: CliArgs = {
    step: null,
    skipApi: false,
    skipWarehouse: false,
    dryRun: false,
    input: null,
    login: null,
    config: null,
  };

  for (let i = 0; i < argv.length; i += 1) {
    const [flag, inline] = splitFlag(argv[i]);

    if (flag === "--skip-api") args.skipApi = true;
    else if (flag === "--skip-warehouse" || flag === "--skip-bq") args.skipWarehouse = true;
    else if (flag === "--dry-run") args.dryRun = true;
    else if (VALUE_FLAGS.has(flag)) {
      const value = inline ?? argv[i + 1];
      if (inline === undefined) i += 1;
      if (!value || value.startsWith("--")) throw new Error(`Missing value for ${flag}`);
      if (flag === "--step") args.step = toStep(value);
      else if (flag === "--input") args.input = value;
      else if (flag === "--login") args.login = value;
      else args.config = value;
    } else {
      throw new Error(`Unknown argument: ${argv[i]}`);
    }
  }

  return args;
}

function splitFlag(arg: string): [string, string | undefined] {
  const eq = arg.indexOf("=");
  if (!arg.startsWith("--") || eq < 0) return [arg, undefined];
  return [arg.slice(0, eq), arg.slice(eq + 1)];
}

const STEPS: Record<string, PipelineStep> = { "1": 1, "2": 2, "3": 3, "4": 4 };

function toStep(value: string): PipelineStep {
  const step = STEPS[value.trim()];
  if (step) return step;
  throw new Error(`--step must be one of 1, 2, 3, 4 (got ${value})`);
}
