import type { EmailValidationResult } from "@roster-outreach/shared";
import type { CompanyRow, ContactRow, RawTaskRow } from "../../src/outreach-engine";
import type { EmailValidator, WarehouseRepository } from "../../src/roster-pipeline";

export function verdict(status: string, score: number): EmailValidationResult {
  return {
    status,
    score,
    checks: { syntax: true, domainExists: true, mxRecords: true, isDisposable: false, isRoleBased: null },
    aliasOf: "",
    typoSuggestion: "",
    error: "",
  };
}

export class FakeValidator implements EmailValidator {
  calls: string[] = [];
  active = 0;
  maxActive = 0;

  constructor(
    private verdicts: Record<string, EmailValidationResult | Error> = {},
    private delayMs: Record<string, number> = {}
  ) {}

  async validate(email: string): Promise<EmailValidationResult> {
    this.calls.push(email);
    this.active += 1;
    this.maxActive = Math.max(this.maxActive, this.active);
    try {
      await new Promise((resolve) => setTimeout(resolve, this.delayMs[email] ?? 0));
      const answer = this.verdicts[email] ?? verdict("VALID", 90);
      if (answer instanceof Error) throw answer;
      return answer;
    } finally {
      this.active -= 1;
    }
  }
}

export class FakeWarehouseRepository implements WarehouseRepository {
  listIds: string[] = [];
  emailLookups: string[][] = [];

  constructor(
    private tasks: RawTaskRow[],
    private companies: CompanyRow[] = [],
    private contacts: Array<[string, ContactRow]> = []
  ) {}

  async loadTasks(listId: string): Promise<RawTaskRow[]> {
    this.listIds.push(listId);
    return this.tasks;
  }

  async loadCompanies(): Promise<CompanyRow[]> {
    return this.companies;
  }

  async loadContacts(emails: readonly string[]): Promise<Map<string, ContactRow>> {
    this.emailLookups.push([...emails]);
    const wanted = new Set(emails);
    return new Map(this.contacts.filter(([email]) => wanted.has(email)));
  }
}
