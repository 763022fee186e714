import { describe, expect, it, vi } from "vitest";
import {
  DelegationError,
  Delegator,
  unwrapResponseBody,
  type DelegationRequest,
  type FetchLike
} from "../src/investigation/delegation.js";

const endpoints = {
  sre: "http://sre.test/troubleshoot",
  investigator: "http://investigator.test/troubleshoot",
  architect: "http://architect.test/troubleshoot"
};

function request(overrides: Partial<DelegationRequest> = {}): DelegationRequest {
  return {
    role: "sre",
    task: "Analyze logs",
    context: {
      session_id: "inv-test",
      user_request: "checkout is failing",
      project_id: "proj-1",
      repo_url: "https://example.com/acme/shop",
      search_window_hours: 1,
      evidence: {}
    },
    timeoutMs: 5_000,
    ...overrides
  };
}

async function rejectionOf(promise: Promise<unknown>): Promise<DelegationError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof DelegationError) return err;
    throw err;
  }
  throw new Error("expected the delegation to fail");
}

describe("unwrapResponseBody", () => {
  it("unwraps a { response } envelope", () => {
    expect(unwrapResponseBody('{"response":"hello"}')).toBe("hello");
  });

  it("returns other bodies unchanged", () => {
    expect(unwrapResponseBody('{"status":"SUCCESS"}')).toBe('{"status":"SUCCESS"}');
    expect(unwrapResponseBody("plain text")).toBe("plain text");
  });
});

describe("Delegator", () => {
  it("posts the task and context to the role endpoint", async () => {
    const fetchImpl = vi.fn<FetchLike>(async () =>
      new Response(JSON.stringify({ response: '{"status":"SUCCESS","confidence":0.9}' }), { status: 200 })
    );
    const delegator = new Delegator(endpoints, { fetchImpl });

    const result = await delegator.delegate(request());

    expect(fetchImpl).toHaveBeenCalledTimes(1);
    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe("http://sre.test/troubleshoot");
    expect(init.method).toBe("POST");
    expect(JSON.parse(String(init.body))).toEqual({ task: "Analyze logs", context: request().context });
    expect(result.httpStatus).toBe(200);
    expect(result.rawText).toBe('{"status":"SUCCESS","confidence":0.9}');
    expect(result.output.kind).toBe("sre");
  });

  it("returns a parse error output when the reply is not valid", async () => {
    const fetchImpl = vi.fn<FetchLike>(async () => new Response("no idea", { status: 200 }));
    const result = await new Delegator(endpoints, { fetchImpl }).delegate(request());
    expect(result.output).toEqual({ kind: "parse_error", message: "Malformed sre output: no JSON object found in response" });
  });

  it("classifies a 4xx as a non-retryable client error", async () => {
    const fetchImpl = vi.fn<FetchLike>(async () => new Response("bad request", { status: 400 }));
    const err = await rejectionOf(new Delegator(endpoints, { fetchImpl }).delegate(request({ role: "investigator" })));
    expect(err.outcome).toBe("client_error");
    expect(err.retryable).toBe(false);
    expect(err.httpStatus).toBe(400);
    expect(err.message).toBe("investigator responded HTTP 400: bad request");
  });

  it("classifies a 5xx as a retryable server error", async () => {
    const fetchImpl = vi.fn<FetchLike>(async () => new Response("", { status: 503 }));
    const err = await rejectionOf(new Delegator(endpoints, { fetchImpl }).delegate(request()));
    expect(err.outcome).toBe("server_error");
    expect(err.retryable).toBe(true);
    expect(err.httpStatus).toBe(503);
  });

  it("classifies network failures as retryable connection errors", async () => {
    const fetchImpl = vi.fn<FetchLike>(async () => {
      throw new TypeError("fetch failed");
    });
    const err = await rejectionOf(new Delegator(endpoints, { fetchImpl }).delegate(request()));
    expect(err.outcome).toBe("connection_error");
    expect(err.retryable).toBe(true);
    expect(err.message).toBe("sre connection error: fetch failed");
  });

  it("times out slow specialists", async () => {
    const fetchImpl: FetchLike = (_url, init) =>
      new Promise<Response>((_resolve, reject) => {
        init.signal?.addEventListener("abort", () => reject(new Error("aborted")));
      });
    const err = await rejectionOf(new Delegator(endpoints, { fetchImpl }).delegate(request({ timeoutMs: 10 })));
    expect(err.outcome).toBe("timeout");
    expect(err.retryable).toBe(true);
    expect(err.message).toBe("sre call timed out after 10ms");
  });

  it("stops without retrying when the caller aborts", async () => {
    const controller = new AbortController();
    controller.abort();
    const fetchImpl: FetchLike = async (_url, init) => {
      if (init.signal?.aborted) throw new Error("aborted");
      return new Response("{}", { status: 200 });
    };
    const err = await rejectionOf(new Delegator(endpoints, { fetchImpl }).delegate(request(), controller.signal));
    expect(err.outcome).toBe("aborted");
    expect(err.retryable).toBe(false);
  });

  it("measures latency with the injected clock", async () => {
    let t = 1_000;
    const now = () => t;
    const fetchImpl: FetchLike = async () => {
      t += 250;
      return new Response('{"status":"SUCCESS","confidence":0.5}', { status: 200 });
    };
    const result = await new Delegator(endpoints, { fetchImpl, now }).delegate(request());
    expect(result.latencyMs).toBe(250);
  });
});
