import type {
  EmailValidationChecks,
  EmailValidationResult,
  TransportStatus,
} from "@roster-outreach/shared";
import type { EmailValidator } from "./types";

export type FetchLike = (input: string, init?: { signal?: AbortSignal }) => Promise<Response>;

export type HttpEmailValidatorOptions = {
  url: string;
  timeoutMs: number;
  retries?: number;
  retryDelayMs?: number;
  fetchImpl?: FetchLike;
};

const UNKNOWN_CHECKS: EmailValidationChecks = {
  syntax: null,
  domainExists: null,
  mxRecords: null,
  isDisposable: null,
  isRoleBased: null,
};

const FAILED_CHECKS: EmailValidationChecks = {
  syntax: false,
  domainExists: false,
  mxRecords: false,
  isDisposable: false,
  isRoleBased: false,
};

const CONNECT_TIMEOUT_CODES = new Set(["UND_ERR_CONNECT_TIMEOUT", "ETIMEDOUT"]);

export class HttpEmailValidator implements EmailValidator {
  private readonly fetchImpl: FetchLike;
  private readonly retries: number;
  private readonly retryDelayMs: number;

  constructor(private readonly options: HttpEmailValidatorOptions) {
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.retries = Math.max(0, options.retries ?? 0);
    this.retryDelayMs = Math.max(0, options.retryDelayMs ?? 0);
  }

  async validate(email: string): Promise<EmailValidationResult> {
    let result = await this.attempt(email);
    // Only connection-level failures are worth another try.
    for (let attempt = 0; attempt < this.retries && isTransient(result); attempt += 1) {
      if (this.retryDelayMs) await sleep(this.retryDelayMs);
      result = await this.attempt(email);
    }
    return result;
  }

  private async attempt(email: string): Promise<EmailValidationResult> {
    const url = new URL(this.options.url);
    url.searchParams.set("email", email);

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.options.timeoutMs);

    try {
      const response = await this.fetchImpl(url.toString(), { signal: controller.signal });
      if (!response.ok) {
        return failure("ERROR", `HTTP ${response.status}: ${response.statusText}`);
      }
      const body: unknown = await response.json();
      return parseValidationBody(body);
    } catch (error) {
      const status = classifyTransportError(error);
      if (status === "ERROR") {
        console.error("[verify] validation request failed", { email, error: errorMessage(error) });
      }
      return failure(status, describeFailure(status, error));
    } finally {
      clearTimeout(timer);
    }
  }
}

export function parseValidationBody(body: unknown): EmailValidationResult {
  if (!isRecord(body)) return failure("ERROR", "Malformed validation response");

  const validations = body.validations;
  const checks: Record<string, unknown> = isRecord(validations) ? validations : {};
  const status = body.status;
  const score = body.score;
  const aliasOf = body.aliasOf;
  const typoSuggestion = body.typoSuggestion;

  return {
    status: typeof status === "string" && status ? status : "UNKNOWN",
    score: typeof score === "number" && Number.isFinite(score) ? score : 0,
    checks: {
      syntax: toFlag(checks.syntax),
      domainExists: toFlag(checks.domain_exists),
      mxRecords: toFlag(checks.mx_records),
      isDisposable: toFlag(checks.is_disposable),
      isRoleBased: toFlag(checks.is_role_based),
    },
    aliasOf: typeof aliasOf === "string" ? aliasOf : "",
    typoSuggestion: typeof typoSuggestion === "string" ? typoSuggestion : "",
    error: "",
  };
}

export function classifyTransportError(error: unknown): TransportStatus {
  if (error instanceof Error) {
    if (error.name === "AbortError" || error.name === "TimeoutError") return "TIMEOUT";
    const code = causeCode(error);
    if (code && CONNECT_TIMEOUT_CODES.has(code)) return "TIMEOUT";
    // undici reports refused/reset/unresolvable hosts as TypeError("fetch failed").
    if (error instanceof TypeError) return "UNKNOWN";
  }
  return "ERROR";
}

export function failure(status: TransportStatus, message: string): EmailValidationResult {
  return {
    status,
    score: 0,
    checks: status === "ERROR" ? { ...FAILED_CHECKS } : { ...UNKNOWN_CHECKS },
    aliasOf: "",
    typoSuggestion: "",
    error: message,
  };
}

// A service-side "UNKNOWN" verdict carries no error text and is final.
function isTransient(result: EmailValidationResult) {
  return (result.status === "UNKNOWN" || result.status === "TIMEOUT") && result.error !== "";
}

function describeFailure(status: TransportStatus, error: unknown) {
  if (status === "UNKNOWN") return "API server not available";
  if (status === "TIMEOUT") return "API request timeout";
  return errorMessage(error);
}

function causeCode(error: Error): string | null {
  const cause: unknown = error.cause;
  if (cause && typeof cause === "object" && "code" in cause && typeof cause.code === "string") {
    return cause.code;
  }
  return null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

function toFlag(value: unknown): boolean | null {
  return typeof value === "boolean" ? value : null;
}

function errorMessage(error: unknown) {
  return error instanceof Error ? error.message : String(error);
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
