import pLimit from "p-limit";
import { VALIDATION_COLUMNS, type EmailValidationResult, type ValidationColumn } from "@roster-outreach/shared";
import { appendColumns, cell, findColumn, type CsvRow, type CsvTable } from "./csv";
import { failure } from "./validator";
import { COL_EMAIL, type EmailValidator } from "./types";

export type VerifyOptions = {
  maxWorkers: number;
  progressEvery?: number;
  onProgress?: (done: number, total: number) => void;
};

export type VerifyResult = {
  table: CsvTable;
  stats: Record<string, number>;
};

export async function verifyTable(
  table: CsvTable,
  validator: EmailValidator,
  options: VerifyOptions
): Promise<VerifyResult> {
  const emailColumn = findColumn(table.fields, COL_EMAIL);
  if (!emailColumn) throw new Error(`Column '${COL_EMAIL}' not found in CSV.`);

  const limit = pLimit(Math.max(1, options.maxWorkers));
  const total = table.rows.length;
  const progressEvery = options.progressEvery ?? 100;
  let done = 0;

  // Results land by row index, so output order matches input order no
  // matter which request finishes first.
  const rows = await Promise.all(
    table.rows.map((row) =>
      limit(async () => {
        const email = cell(row, emailColumn);
        const out = email ? withValidation(row, await validateSafely(validator, email)) : withBlankValidation(row);
        done += 1;
        if (options.onProgress && progressEvery > 0 && done % progressEvery === 0) {
          options.onProgress(done, total);
        }
        return out;
      })
    )
  );

  return {
    table: { fields: appendColumns(table.fields, VALIDATION_COLUMNS), rows },
    stats: countStatuses(rows),
  };
}

export function validationColumns(result: EmailValidationResult): Record<ValidationColumn, string> {
  return {
    validation_status: result.status,
    validation_score: String(result.score),
    syntax: flag(result.checks.syntax),
    domain_exists: flag(result.checks.domainExists),
    mx_records: flag(result.checks.mxRecords),
    is_disposable: flag(result.checks.isDisposable),
    is_role_based: flag(result.checks.isRoleBased),
    alias_of: result.aliasOf,
    typo_suggestion: result.typoSuggestion,
    validation_error: result.error,
  };
}

async function validateSafely(validator: EmailValidator, email: string): Promise<EmailValidationResult> {
  try {
    return await validator.validate(email);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error("[verify] row generated an exception", { email, error: message });
    return failure("ERROR", message);
  }
}

function withValidation(row: CsvRow, result: EmailValidationResult): CsvRow {
  return { ...row, ...validationColumns(result) };
}

function withBlankValidation(row: CsvRow): CsvRow {
  const out: CsvRow = { ...row };
  for (const column of VALIDATION_COLUMNS) {
    if (out[column] === undefined) out[column] = "";
  }
  return out;
}

function countStatuses(rows: readonly CsvRow[]) {
  const stats: Record<string, number> = {};
  for (const row of rows) {
    const status = row.validation_status || "NO_EMAIL";
    stats[status] = (stats[status] ?? 0) + 1;
  }
  return stats;
}

function flag(value: boolean | null) {
  if (value === null) return "";
  return value ? "true" : "false";
}
