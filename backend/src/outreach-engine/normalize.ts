const ORG_CODE_SEPARATORS = /[,\-/]/g;

// Name used for index keys and containment tests.
export function normalizeName(input: string | null | undefined): string {
  if (!input) return "";
  return input.trim().toUpperCase();
}

export function normalizeOrgCode(input: string | null | undefined): string {
  if (!input) return "";
  return input.trim().toUpperCase();
}

// "A, B-C" -> ["A", "B", "C"]; one label may bundle several org codes.
export function splitOrgCodes(label: string | null | undefined): string[] {
  if (!label) return [];
  return label
    .replace(ORG_CODE_SEPARATORS, " ")
    .split(/\s+/)
    .map((token) => token.trim().toUpperCase())
    .filter(Boolean);
}

// Either string contains the other. Both sides must already be normalized.
export function containsEither(left: string, right: string): boolean {
  if (!left || !right) return false;
  return left.includes(right) || right.includes(left);
}

export function lowerLabels(labels: readonly string[]): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const label of labels) {
    const lowered = label.trim().toLowerCase();
    if (!lowered || seen.has(lowered)) continue;
    seen.add(lowered);
    out.push(lowered);
  }
  return out;
}

// Trailing path segment of a CRM record URL.
export function recordIdFromUrl(url: string | null | undefined): string {
  if (!url) return "";
  const parts = url.trim().replace(/\/+$/, "").split("/");
  return parts[parts.length - 1] ?? "";
}

