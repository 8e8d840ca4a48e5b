import { describe, expect, it } from "vitest";
import { decodeField, decodeLabels, toValueIds } from "../../src/outreach-engine";
import { dropdownField, labelField } from "./fixtures";

describe("decodeLabels", () => {
  const orgCodes = labelField("Org Code", null, { "a1": "ACME", "b2": "BETA, GAMMA" });

  it("resolves string ids in input order", () => {
    expect(decodeLabels(orgCodes, ["b2", "a1"])).toEqual(["BETA, GAMMA", "ACME"]);
  });

  it("accepts a scalar string id", () => {
    expect(decodeLabels(orgCodes, "a1")).toEqual(["ACME"]);
  });

  it("drops ids without an option", () => {
    expect(decodeLabels(orgCodes, ["zz", "a1"])).toEqual(["ACME"]);
  });

  it("resolves numeric values by orderindex", () => {
    const field = dropdownField("Customer Type", 1, ["View", "View + Flow"]);
    expect(decodeLabels(field, field.value)).toEqual(["View + Flow"]);
  });

  it("falls back to position when options carry no orderindex", () => {
    const field = {
      name: "Customer Type",
      type_config: { options: [{ id: "x", name: "First" }, { id: "y", name: "Second" }] },
    };
    expect(decodeLabels(field, 1)).toEqual(["Second"]);
  });

  it("treats numeric-looking strings as ids, not indexes", () => {
    const field = dropdownField("Customer Type", "1", ["View", "View + Flow"]);
    expect(decodeLabels(field, field.value)).toEqual([]);
  });

  it("prefers label over name", () => {
    const field = { name: "Services", type_config: { options: [{ id: "s", label: "Labor", name: "labor-legacy" }] } };
    expect(decodeLabels(field, ["s"])).toEqual(["Labor"]);
  });

  it("returns nothing for a missing field, value or options table", () => {
    expect(decodeLabels(undefined, ["a1"])).toEqual([]);
    expect(decodeLabels(orgCodes, null)).toEqual([]);
    expect(decodeLabels({ name: "Org Code", type_config: null }, ["a1"])).toEqual([]);
  });
});

describe("toValueIds", () => {
  it("tags numbers and strings and skips everything else", () => {
    expect(toValueIds([3, "x", null, "", { id: "y" }])).toEqual([
      { kind: "numeric_index", index: 3 },
      { kind: "string_id", id: "x" },
    ]);
  });
});

describe("decodeField", () => {
  it("looks the field up by name", () => {
    const fields = [
      labelField("Services", ["s1", "s2"], { s1: "Labor", s2: "QRM" }),
      labelField("Org Code", ["o1"], { o1: "ACME" }),
    ];
    expect(decodeField(fields, "Services")).toEqual(["Labor", "QRM"]);
    expect(decodeField(fields, "Hubspot URL")).toEqual([]);
  });
});
