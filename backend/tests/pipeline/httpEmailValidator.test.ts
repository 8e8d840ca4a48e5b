import { afterEach, describe, expect, it, vi } from "vitest";
import {
  HttpEmailValidator,
  classifyTransportError,
  parseValidationBody,
  type FetchLike,
} from "../../src/roster-pipeline";

const URL_BASE = "http://validator.test/api/validate";

function validator(fetchImpl: FetchLike, retries = 0, timeoutMs = 1000) {
  return new HttpEmailValidator({ url: URL_BASE, timeoutMs, retries, retryDelayMs: 0, fetchImpl });
}

function jsonResponse(body: unknown) {
  return new Response(JSON.stringify(body), { status: 200, headers: { "content-type": "application/json" } });
}

function abortError() {
  return Object.assign(new Error("This operation was aborted"), { name: "AbortError" });
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe("HttpEmailValidator", () => {
  it("passes the service verdict through", async () => {
    const fetchImpl = vi.fn(async (_input: string) =>
      jsonResponse({
        status: "VALID",
        score: 95,
        validations: { syntax: true, domain_exists: true, mx_records: true, is_disposable: false, is_role_based: false },
        aliasOf: "",
        typoSuggestion: "",
      })
    );

    const result = await validator(fetchImpl).validate("ann@example.com");

    expect(fetchImpl).toHaveBeenCalledTimes(1);
    expect(fetchImpl.mock.calls[0][0]).toBe(`${URL_BASE}?email=ann%40example.com`);
    expect(result).toEqual({
      status: "VALID",
      score: 95,
      checks: { syntax: true, domainExists: true, mxRecords: true, isDisposable: false, isRoleBased: false },
      aliasOf: "",
      typoSuggestion: "",
      error: "",
    });
  });

  it("reports HTTP errors with failed checks", async () => {
    const fetchImpl = vi.fn(async () => new Response("down", { status: 503, statusText: "Service Unavailable" }));

    const result = await validator(fetchImpl, 2).validate("ann@example.com");

    expect(fetchImpl).toHaveBeenCalledTimes(1);
    expect(result.status).toBe("ERROR");
    expect(result.error).toBe("HTTP 503: Service Unavailable");
    expect(result.checks.syntax).toBe(false);
  });

  it("retries an unreachable service and then reports UNKNOWN", async () => {
    const fetchImpl = vi.fn(async () => {
      throw new TypeError("fetch failed");
    });

    const result = await validator(fetchImpl, 1).validate("ann@example.com");

    expect(fetchImpl).toHaveBeenCalledTimes(2);
    expect(result.status).toBe("UNKNOWN");
    expect(result.error).toBe("API server not available");
    expect(result.checks.syntax).toBeNull();
  });

  it("recovers when the retry succeeds", async () => {
    const fetchImpl = vi
      .fn<FetchLike>()
      .mockRejectedValueOnce(new TypeError("fetch failed"))
      .mockResolvedValueOnce(jsonResponse({ status: "RISKY", score: 40 }));

    const result = await validator(fetchImpl, 1).validate("ann@example.com");

    expect(result.status).toBe("RISKY");
    expect(result.score).toBe(40);
  });

  it("does not retry a service-side UNKNOWN verdict", async () => {
    const fetchImpl = vi.fn(async () => jsonResponse({ status: "UNKNOWN", score: 0 }));

    const result = await validator(fetchImpl, 3).validate("ann@example.com");

    expect(fetchImpl).toHaveBeenCalledTimes(1);
    expect(result.status).toBe("UNKNOWN");
    expect(result.error).toBe("");
  });

  it("aborts slow requests after the timeout", async () => {
    const fetchImpl: FetchLike = (_input, init) =>
      new Promise((_resolve, reject) => {
        init?.signal?.addEventListener("abort", () => reject(abortError()));
      });

    const result = await validator(fetchImpl, 0, 5).validate("ann@example.com");

    expect(result.status).toBe("TIMEOUT");
    expect(result.error).toBe("API request timeout");
  });

  it("reports other failures as ERROR", async () => {
    const errorLog = vi.spyOn(console, "error").mockImplementation(() => {});
    const fetchImpl = vi.fn(async () => {
      throw new Error("boom");
    });

    const result = await validator(fetchImpl, 2).validate("ann@example.com");

    expect(fetchImpl).toHaveBeenCalledTimes(1);
    expect(result.status).toBe("ERROR");
    expect(result.error).toBe("boom");
    expect(errorLog).toHaveBeenCalledTimes(1);
  });
});

describe("classifyTransportError", () => {
  it("maps transport failures to statuses", () => {
    expect(classifyTransportError(abortError())).toBe("TIMEOUT");
    expect(classifyTransportError(new TypeError("fetch failed", { cause: { code: "UND_ERR_CONNECT_TIMEOUT" } }))).toBe(
      "TIMEOUT"
    );
    expect(classifyTransportError(new TypeError("fetch failed", { cause: { code: "ECONNREFUSED" } }))).toBe("UNKNOWN");
    expect(classifyTransportError(new Error("boom"))).toBe("ERROR");
    expect(classifyTransportError("boom")).toBe("ERROR");
  });
});

describe("parseValidationBody", () => {
  it("defaults missing fields", () => {
    expect(parseValidationBody({})).toEqual({
      status: "UNKNOWN",
      score: 0,
      checks: { syntax: null, domainExists: null, mxRecords: null, isDisposable: null, isRoleBased: null },
      aliasOf: "",
      typoSuggestion: "",
      error: "",
    });
  });

  it("rejects non-object bodies", () => {
    const result = parseValidationBody("VALID");
    expect(result.status).toBe("ERROR");
    expect(result.error).toBe("Malformed validation response");
  });
});
