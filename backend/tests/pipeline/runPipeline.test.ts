import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { parseOutreachRules, readCsv, run_pipeline, type ConfigOverride } from "../../src/roster-pipeline";
import { dropdownField, labelField, rawTask } from "../outreach/fixtures";
import { FakeValidator, FakeWarehouseRepository } from "./fakes";

const rules = parseOutreachRules({
  aliases: { orgCodes: { EVGOLD: "EVG" } },
  exclusions: { orgCodes: ["AVIANA"], corporations: [] },
});

const tasks = [
  rawTask("t1", "Evergreen Senior Living", "active", [
    labelField("Org Code", ["o1"], { o1: "EVG" }),
    dropdownField("Customer Type", 0, ["View", "View + Flow"]),
    labelField("Services", ["s1"], { s1: "Labor" }),
  ]),
];

let dir = "";

function overrideFor(root: string): ConfigOverride {
  return {
    files: {
      input: path.join(root, "roster.csv"),
      loginData: path.join(root, "logins.csv"),
      verified: path.join(root, "out", "verified.csv"),
      filtered: path.join(root, "out", "filtered.csv"),
      enriched: path.join(root, "out", "enriched.csv"),
      final: path.join(root, "out", "final.csv"),
    },
    warehouse: { taskListId: "list-1" },
  };
}

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), "roster-pipeline-"));
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
  fs.rmSync(dir, { recursive: true, force: true });
});

describe("run_pipeline", () => {
  it("runs all four steps and writes the final roster", async () => {
    fs.writeFileSync(
      path.join(dir, "roster.csv"),
      [
        "email,first_name,last_name,org_code,covr_corporation,facilities",
        "Ann@Example.com,Ann,Lee (Administrator),EVGOLD,Evergreen Senior Living,",
        "bob@example.com,Bob,Stone,AVIANA,Aviana,",
        "",
      ].join("\n")
    );
    fs.writeFileSync(
      path.join(dir, "logins.csv"),
      "Username,Count of Views,Last Login\nann@example.com,7,2024-06-01\nTotal,7,\n"
    );
    const validator = new FakeValidator();
    const repository = new FakeWarehouseRepository(tasks, [], [
      ["ann@example.com", { contact_id: "501", first_name: "Ann", last_name: "Lee" }],
    ]);

    const result = await run_pipeline({ cfgOverride: overrideFor(dir), rules }, { validator, repository });

    expect(result.ok).toBe(true);
    expect(result.steps.map((step) => [step.step, step.ok, step.rows])).toEqual([
      [1, true, 2],
      [2, true, 1],
      [3, true, 1],
      [4, true, 1],
    ]);
    expect(result.finalOutput).toBe(path.join(dir, "out", "final.csv"));
    expect(validator.calls).toEqual(["Ann@Example.com", "bob@example.com"]);
    expect(repository.listIds).toEqual(["list-1"]);
    expect(repository.emailLookups).toEqual([["ann@example.com"]]);

    const final = readCsv(result.finalOutput);
    expect(final.rows).toHaveLength(1);
    expect(final.rows[0]).toMatchObject({
      last_name: "Lee",
      "job title": "Administrator",
      validation_status: "VALID",
      task_id: "t1",
      campaign: "View Labor",
      "View User type": "View Labor - Corp",
      match_method: "alias(EVG)",
      hubspot_contact_id: "501",
      count_of_views: "7",
      last_login: "2024-06-01",
    });
  });

  it("records skipped steps", async () => {
    const result = await run_pipeline(
      { steps: [3, 1], skipValidation: true, skipWarehouse: true, cfgOverride: overrideFor(dir), rules },
      {}
    );

    expect(result.ok).toBe(true);
    expect(result.steps).toEqual([
      { step: 1, ok: true, skipped: true },
      { step: 3, ok: true, skipped: true },
    ]);
  });

  it("stops at the first failing step", async () => {
    const result = await run_pipeline({ steps: [2, 4], cfgOverride: overrideFor(dir), rules }, {});

    expect(result.ok).toBe(false);
    expect(result.steps).toEqual([
      { step: 2, ok: false, error: `CSV not found: ${path.join(dir, "out", "verified.csv")}` },
    ]);
  });

  it("fails step 1 without a validator", async () => {
    fs.writeFileSync(path.join(dir, "roster.csv"), "email\nann@example.com\n");

    const result = await run_pipeline({ steps: [1], cfgOverride: overrideFor(dir), rules }, {});

    expect(result.ok).toBe(false);
    expect(result.steps[0].error).toBe("No email validator configured.");
  });
});
