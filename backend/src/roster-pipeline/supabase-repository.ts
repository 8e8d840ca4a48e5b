import pLimit from "p-limit";
import type { SupabaseClient } from "@supabase/supabase-js";
import type { CompanyRow, ContactRow, RawTaskRow } from "../outreach-engine";
import type { WarehouseRepository } from "./types";

export const TASKS_TABLE = "clickup_tasks";
export const COMPANIES_TABLE = "hubspot_companies";
export const CONTACTS_TABLE = "hubspot_contacts";

export type PageResult = {
  data: unknown[] | null;
  error: { message: string } | null;
};

export type WarehouseOptions = {
  pageSize: number;
  contactBatchSize: number;
  contactConcurrency: number;
};

// ── SupabaseWarehouseRepository ───────────────────────────────────────────

export class SupabaseWarehouseRepository implements WarehouseRepository {
  constructor(
    private supabase: SupabaseClient,
    private options: WarehouseOptions
  ) {}

  async loadTasks(listId: string): Promise<RawTaskRow[]> {
    if (!listId) throw new Error("Task list id is required to load tasks.");
    // Ordered by id so pages are stable and the name index scan order is
    // reproducible between runs.
    const rows = await fetchAllPages(
      (from, to) =>
        this.supabase
          .from(TASKS_TABLE)
          .select("id, name, status, custom_fields")
          .eq("list->>id", listId)
          .order("id", { ascending: true })
          .range(from, to),
      this.options.pageSize,
      TASKS_TABLE
    );
    const tasks = rows.map(toRawTaskRow).filter((row): row is RawTaskRow => row !== null);
    console.log(`[warehouse] loaded ${tasks.length} tasks from list ${listId}`);
    return tasks;
  }

  async loadCompanies(): Promise<CompanyRow[]> {
    const rows = await fetchAllPages(
      (from, to) =>
        this.supabase
          .from(COMPANIES_TABLE)
          .select("id, properties_name")
          .not("properties_name", "is", null)
          .order("id", { ascending: true })
          .range(from, to),
      this.options.pageSize,
      COMPANIES_TABLE
    );
    const companies = rows.map(toCompanyRow).filter((row): row is CompanyRow => row !== null);
    console.log(`[warehouse] loaded ${companies.length} companies`);
    return companies;
  }

  async loadContacts(emails: readonly string[]): Promise<Map<string, ContactRow>> {
    const contacts = await fetchContactBatches(
      (batch) =>
        this.supabase
          .from(CONTACTS_TABLE)
          .select("id, properties_email, properties_firstname, properties_lastname")
          .in("properties_email", batch),
      emails,
      { batchSize: this.options.contactBatchSize, concurrency: this.options.contactConcurrency }
    );
    console.log(`[warehouse] matched ${contacts.size} contacts for ${emails.length} emails`);
    return contacts;
  }
}

// Failed batches are logged and skipped. Results are merged in batch order.
export async function fetchContactBatches(
  fetchBatch: (batch: string[]) => PromiseLike<PageResult>,
  emails: readonly string[],
  options: { batchSize: number; concurrency: number }
): Promise<Map<string, ContactRow>> {
  const batches = chunk(
    emails.filter((email) => email),
    Math.max(1, options.batchSize)
  );
  const limit = pLimit(Math.max(1, options.concurrency));

  const results = await Promise.all(
    batches.map((batch, index) =>
      limit(async () => {
        const { data, error } = await fetchBatch(batch);
        if (error) {
          console.warn("[warehouse] contact batch failed", {
            batch: index + 1,
            of: batches.length,
            error: error.message,
          });
          return [];
        }
        return data ?? [];
      })
    )
  );

  const contacts = new Map<string, ContactRow>();
  for (const rows of results) addContacts(contacts, rows);
  return contacts;
}

export async function fetchAllPages(
  fetchPage: (from: number, to: number) => PromiseLike<PageResult>,
  pageSize: number,
  label: string
): Promise<unknown[]> {
  const rows: unknown[] = [];
  const size = Math.max(1, pageSize);
  let from = 0;

  while (true) {
    const { data, error } = await fetchPage(from, from + size - 1);
    if (error) throw new Error(`Failed to load ${label}: ${error.message}`);
    if (!data || data.length === 0) break;
    rows.push(...data);
    if (data.length < size) break;
    from += size;
  }

  return rows;
}

export function addContacts(target: Map<string, ContactRow>, rows: readonly unknown[]) {
  for (const raw of rows) {
    if (!isRecord(raw)) continue;
    const email = asText(raw.properties_email).toLowerCase();
    if (!email) continue;
    target.set(email, {
      contact_id: asText(raw.id),
      first_name: asText(raw.properties_firstname),
      last_name: asText(raw.properties_lastname),
    });
  }
}

export function toRawTaskRow(raw: unknown): RawTaskRow | null {
  if (!isRecord(raw)) return null;
  const id = asText(raw.id);
  if (!id) return null;
  return {
    id,
    name: typeof raw.name === "string" ? raw.name : null,
    status: raw.status ?? null,
    custom_fields: raw.custom_fields ?? null,
  };
}

export function toCompanyRow(raw: unknown): CompanyRow | null {
  if (!isRecord(raw)) return null;
  const id = asText(raw.id);
  const name = asText(raw.properties_name);
  if (!id || !name) return null;
  return { id, name };
}

export function chunk<T>(items: readonly T[], size: number): T[][] {
  const out: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    out.push(items.slice(i, i + size));
  }
  return out;
}

function asText(value: unknown): string {
  if (typeof value === "string") return value.trim();
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  return "";
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}
