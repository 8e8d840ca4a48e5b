import { describe, expect, it } from "vitest";
import { companyNameMap, parseStatus, toTaskRecord, toTaskRecords } from "../../src/outreach-engine";
import { dropdownField, labelField, rawTask } from "./fixtures";

const companies = companyNameMap([
  { id: "9001", name: "Acme Senior Living " },
  { id: "9002", name: "Beta Care" },
]);

const fields = [
  labelField("Org Code", ["o1"], { o1: "ACME, ACM2" }),
  dropdownField("Customer Type", 0, ["View", "View + Flow"]),
  labelField("Services", ["s1", "s2", "s1"], { s1: "Labor", s2: "MDS" }),
  labelField("Outreach Campaign", ["c1"], { c1: "QRM Downsell" }),
  { name: "Hubspot URL", value: "https://app.hubspot.com/contacts/1/company/9001/" },
];

describe("toTaskRecord", () => {
  it("decodes JSON-encoded status and custom fields", () => {
    const task = toTaskRecord(rawTask("t1", " Acme Health ", "Active", fields), companies);

    expect(task).toEqual({
      id: "t1",
      name: "Acme Health",
      status: "active",
      customer_type: "view",
      services: ["labor", "mds"],
      outreach_campaigns: ["qrm downsell"],
      org_code_labels: ["ACME, ACM2"],
      hubspot_url: "https://app.hubspot.com/contacts/1/company/9001/",
      record_id: "9001",
      company_name: "Acme Senior Living",
    });
  });

  it("accepts already-parsed status and custom fields", () => {
    const task = toTaskRecord(rawTask("t1", "Acme Health", "implementation", fields, "parsed"), companies);
    expect(task.status).toBe("implementation");
    expect(task.services).toEqual(["labor", "mds"]);
  });

  it("keeps the task with empty fields when custom_fields is malformed", () => {
    const task = toTaskRecord(
      { id: "t2", name: "Broken", status: '{"status":"active"}', custom_fields: "{not json" },
      companies
    );
    expect(task.name).toBe("Broken");
    expect(task.status).toBe("active");
    expect(task.customer_type).toBe("");
    expect(task.services).toEqual([]);
    expect(task.org_code_labels).toEqual([]);
  });

  it("leaves company_name empty when the record id is unknown", () => {
    const task = toTaskRecord(
      rawTask("t3", "Gamma", "active", [{ name: "Hubspot URL", value: ["https://crm.example/company/777"] }]),
      companies
    );
    expect(task.record_id).toBe("777");
    expect(task.company_name).toBe("");
  });

  it("returns frozen records", () => {
    const task = toTaskRecord(rawTask("t1", "Acme", "active", fields), companies);
    expect(Object.isFrozen(task)).toBe(true);
  });
});

describe("toTaskRecords", () => {
  it("keeps scan order", () => {
    const tasks = toTaskRecords(
      [rawTask("b", "Second", "active", []), rawTask("a", "First", "active", [])],
      companies
    );
    expect(tasks.map((task) => task.id)).toEqual(["b", "a"]);
  });
});

describe("parseStatus", () => {
  it("defaults to unknown", () => {
    expect(parseStatus(null)).toBe("unknown");
    expect(parseStatus("not json")).toBe("unknown");
    expect(parseStatus({ color: "#fff" })).toBe("unknown");
    expect(parseStatus({ status: "  " })).toBe("unknown");
  });

  it("lowercases the label", () => {
    expect(parseStatus('{"status":"ACTIVE"}')).toBe("active");
  });
});
