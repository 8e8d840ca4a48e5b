import {
  FALLBACK_USER_TYPE,
  type CampaignTag,
  type UserType,
} from "@roster-outreach/shared";
import type { TaskRecord } from "./types";

export const VIEW_CUSTOMER_TYPE = "view";
export const LOSING_ACCESS_PATTERN = /downsell|losing access/i;

type Eligibility = "view" | "untyped";

type CampaignRule = {
  tag: CampaignTag;
  eligible: readonly Eligibility[];
  when: (task: TaskRecord) => boolean;
};

// Priority order: a downgrade outreach beats a cross-sell even when both hold.
export const CAMPAIGN_RULES: readonly CampaignRule[] = [
  {
    tag: "Losing Access",
    eligible: ["view"],
    when: (task) =>
      isActive(task) && task.outreach_campaigns.some((label) => LOSING_ACCESS_PATTERN.test(label)),
  },
  {
    tag: "View Labor",
    eligible: ["view"],
    when: (task) => isActive(task) && task.services.includes("labor"),
  },
  {
    tag: "QRM Cadence",
    eligible: ["view"],
    when: (task) => isActive(task) && hasExactly(task.services, ["qrm", "mds"]),
  },
  {
    tag: "View Clinical",
    eligible: ["view"],
    when: (task) => isActive(task) && task.customer_type === VIEW_CUSTOMER_TYPE,
  },
  {
    tag: "Implementation",
    eligible: ["view", "untyped"],
    when: (task) => task.status === "implementation",
  },
  {
    tag: "Other Active",
    eligible: ["view", "untyped"],
    when: (task) => isActive(task),
  },
];

export function classifyCampaign(task: TaskRecord | null): CampaignTag | "" {
  if (!task) return "";
  const eligibility = eligibilityOf(task.customer_type);
  if (!eligibility) return "";

  for (const rule of CAMPAIGN_RULES) {
    if (!rule.eligible.includes(eligibility)) continue;
    if (rule.when(task)) return rule.tag;
  }
  return "";
}

// Blank or comma-joined facility lists are corporate contacts.
export function userTypeFor(campaign: CampaignTag | "", facilities: string | null | undefined): UserType {
  if (!campaign) return FALLBACK_USER_TYPE;
  const trimmed = (facilities ?? "").trim();
  if (!trimmed || trimmed.includes(",")) return `${campaign} - Corp`;
  return `${campaign} - facility`;
}

export function isFacilityUserType(userType: string): boolean {
  return userType.toLowerCase().endsWith("- facility");
}

function eligibilityOf(customerType: string): Eligibility | null {
  const normalized = customerType.trim().toLowerCase();
  if (normalized === VIEW_CUSTOMER_TYPE) return "view";
  if (!normalized) return "untyped";
  return null;
}

function isActive(task: TaskRecord) {
  return task.status === "active";
}

function hasExactly(values: readonly string[], expected: readonly string[]) {
  const set = new Set(values);
  if (set.size !== expected.length) return false;
  return expected.every((value) => set.has(value));
}
