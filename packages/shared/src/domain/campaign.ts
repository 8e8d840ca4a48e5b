/**
 * Campaign and match-method types.
 *
 * A campaign is the outreach bucket a roster user lands in, derived from the
 * resolved corporation task. The match method records which resolver tier
 * produced that task.
 */

/**
 * Outreach campaigns in priority order (highest first).
 * - Losing Access:  customer flagged for a downsell / losing-access outreach
 * - View Labor:     active customer already on the labor service
 * - QRM Cadence:    active customer on exactly QRM + MDS
 * - View Clinical:  any other active View customer
 * - Implementation: customer still being onboarded
 * - Other Active:   any other active customer
 * A View customer can reach every tag. A customer with no customer type
 * only reaches Implementation and Other Active; any other type gets none.
 */
export type CampaignTag =
  | "Losing Access"
  | "View Labor"
  | "QRM Cadence"
  | "View Clinical"
  | "Implementation"
  | "Other Active";

export const CAMPAIGN_PRIORITY: readonly CampaignTag[] = [
  "Losing Access",
  "View Labor",
  "QRM Cadence",
  "View Clinical",
  "Implementation",
  "Other Active",
];

/** User type written for rows without any campaign. */
export const FALLBACK_USER_TYPE = "View - No Labor";

/**
 * Scope of a user inside a campaign.
 * - Corp:     no facility or several facilities (corporate-level contact)
 * - facility: exactly one facility
 */
export type UserScope = "Corp" | "facility";

export type UserType = `${CampaignTag} - ${UserScope}` | typeof FALLBACK_USER_TYPE;

/**
 * Resolver tier that produced a task.
 * - alias(<code>):      manual org-code alias
 * - org_code:           direct org-code lookup
 * - name_alias(<NAME>): manual corporation-name alias
 * - name_fuzzy_match:   containment match on the corporation name
 * - "":                 no match
 */
export type MatchMethod =
  | `alias(${string})`
  | "org_code"
  | `name_alias(${string})`
  | "name_fuzzy_match"
  | "";
