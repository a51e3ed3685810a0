import { describe, expect, it } from "@jest/globals";
import {
  backoffDelay,
  classifyOracleError,
  CodeSynthesisClient,
  CodeSynthesisOracle,
  extractSingleCodeBlock,
  RetryPolicy,
} from "../oracle.js";
import type { GenerationRequest } from "../prompt.js";

const request: GenerationRequest = {
  layer: "entity_impl",
  system: "Output rules",
  user: "Write the entity",
};

function scriptedOracle(steps: Array<string | Error>): CodeSynthesisOracle & { calls: number } {
  const oracle = {
    calls: 0,
    async complete(): Promise<string> {
      const step = steps[Math.min(oracle.calls, steps.length - 1)];
      oracle.calls += 1;
      if (step instanceof Error) {
        throw step;
      }
      return step;
    },
  };
  return oracle;
}

function recordingSleep(): { delays: number[]; sleep: (ms: number) => Promise<void> } {
  const delays: number[] = [];
  return {
    delays,
    sleep: async (ms: number) => {
      delays.push(ms);
    },
  };
}

const policy: Partial<RetryPolicy> = {
  maxAttempts: 4,
  initialBackoffMs: 100,
  maxBackoffMs: 250,
  attemptTimeoutMs: 1_000,
};

describe("extractSingleCodeBlock", () => {
  it("returns the body of the only block", () => {
    const response = "Here you go:\n```java\n\npublic class Orders {}\n\n```\nEnjoy";

    expect(extractSingleCodeBlock(response)).toBe("public class Orders {}\n");
  });

  it("accepts tilde fences and CRLF line endings", () => {
    expect(extractSingleCodeBlock("~~~xml\r\n<mapper/>\r\n~~~\r\n")).toBe("<mapper/>\n");
  });

  it("keeps shorter fences nested inside a longer one", () => {
    const response = "````md\n```java\nx\n```\n````";

    expect(extractSingleCodeBlock(response)).toBe("```java\nx\n```\n");
  });

  it("rejects a response without a block", () => {
    expect(() => extractSingleCodeBlock("public class Orders {}")).toThrow(
      "Expected exactly one fenced code block, found 0",
    );
  });

  it("rejects a response with two blocks", () => {
    const response = "```java\nclass A {}\n```\n\n```java\nclass B {}\n```";

    expect(() => extractSingleCodeBlock(response)).toThrow(
      "Expected exactly one fenced code block, found 2",
    );
  });

  it("rejects an unterminated block", () => {
    expect(() => extractSingleCodeBlock("```java\nclass A {}\n")).toThrow(
      "Response has an unterminated code block",
    );
  });

  it("rejects an empty block", () => {
    expect(() => extractSingleCodeBlock("```java\n\n   \n```")).toThrow("Fenced code block is empty");
  });
});

describe("classifyOracleError", () => {
  it("maps HTTP 429 to OracleRateLimited", () => {
    expect(classifyOracleError({ status: 429, message: "slow down" }).kind).toBe("OracleRateLimited");
  });

  it("maps a rate limit error by name", () => {
    const error = new Error("too many requests");
    error.name = "RateLimitError";

    expect(classifyOracleError(error).kind).toBe("OracleRateLimited");
  });

  it("maps anything else to OracleUnavailable", () => {
    const failure = classifyOracleError(new Error("socket hang up"));

    expect(failure.kind).toBe("OracleUnavailable");
    expect(failure.message).toBe("Oracle unavailable: socket hang up");
  });
});

describe("backoffDelay", () => {
  it("doubles per attempt and stops at the cap", () => {
    const full: RetryPolicy = { maxAttempts: 5, initialBackoffMs: 100, maxBackoffMs: 250, attemptTimeoutMs: 1 };

    expect([1, 2, 3, 4].map((attempt) => backoffDelay(full, attempt))).toEqual([100, 200, 250, 250]);
  });
});

describe("CodeSynthesisClient", () => {
  it("retries an unavailable oracle and reports the attempt count", async () => {
    const oracle = scriptedOracle([
      Object.assign(new Error("bad gateway"), { status: 502 }),
      "```java\nclass Orders {}\n```",
    ]);
    const { delays, sleep } = recordingSleep();
    const client = new CodeSynthesisClient(oracle, policy, sleep);

    await expect(client.synthesize(request)).resolves.toEqual({
      code: "class Orders {}\n",
      attempts: 2,
    });
    expect(delays).toEqual([100]);
  });

  it("gives up after maxAttempts with capped exponential backoff", async () => {
    const oracle = scriptedOracle([Object.assign(new Error("rate limited"), { status: 429 })]);
    const { delays, sleep } = recordingSleep();
    const client = new CodeSynthesisClient(oracle, policy, sleep);

    await expect(client.synthesize(request)).rejects.toMatchObject({
      kind: "OracleRateLimited",
      attempts: 4,
    });
    expect(oracle.calls).toBe(4);
    expect(delays).toEqual([100, 200, 250]);
  });

  it("does not retry a malformed response", async () => {
    const oracle = scriptedOracle(["I cannot help with that."]);
    const { delays, sleep } = recordingSleep();
    const client = new CodeSynthesisClient(oracle, policy, sleep);

    await expect(client.synthesize(request)).rejects.toMatchObject({
      kind: "MalformedResponse",
      attempts: 1,
    });
    expect(oracle.calls).toBe(1);
    expect(delays).toEqual([]);
  });

  it("times out a slow attempt and aborts the oracle call", async () => {
    let received: AbortSignal | undefined;
    const oracle: CodeSynthesisOracle = {
      complete: (_request, options) => {
        received = options.signal;
        return new Promise<string>((_resolve, reject) => {
          options.signal.addEventListener("abort", () => reject(new Error("aborted")));
        });
      },
    };
    const client = new CodeSynthesisClient(oracle, { maxAttempts: 1, attemptTimeoutMs: 10 });

    await expect(client.synthesize(request)).rejects.toMatchObject({
      kind: "OracleUnavailable",
      message: "Oracle timed out after 10ms",
    });
    expect(received?.aborted).toBe(true);
  });

  it("does not call the oracle once the run is cancelled", async () => {
    const oracle = scriptedOracle(["```java\nclass A {}\n```"]);
    const controller = new AbortController();
    controller.abort();
    const client = new CodeSynthesisClient(oracle, policy);

    await expect(client.synthesize(request, controller.signal)).rejects.toMatchObject({
      kind: "Cancelled",
    });
    expect(oracle.calls).toBe(0);
  });

  it("cancels an in-flight call without retrying", async () => {
    const controller = new AbortController();
    let calls = 0;
    const oracle: CodeSynthesisOracle = {
      complete: () => {
        calls += 1;
        controller.abort();
        return new Promise<string>(() => undefined);
      },
    };
    const client = new CodeSynthesisClient(oracle, policy);

    await expect(client.synthesize(request, controller.signal)).rejects.toMatchObject({
      kind: "Cancelled",
      attempts: 1,
    });
    expect(calls).toBe(1);
  });

  it("reports cancellation when the oracle rejects on abort", async () => {
    const controller = new AbortController();
    const { delays, sleep } = recordingSleep();
    let calls = 0;
    const oracle: CodeSynthesisOracle = {
      complete: (_request, options) => {
        calls += 1;
        const pending = new Promise<string>((_resolve, reject) => {
          options.signal.addEventListener("abort", () => reject(new Error("socket closed")));
        });
        controller.abort();
        return pending;
      },
    };
    const client = new CodeSynthesisClient(oracle, policy, sleep);

    await expect(client.synthesize(request, controller.signal)).rejects.toMatchObject({
      kind: "Cancelled",
      message: "Run cancelled",
      attempts: 1,
    });
    expect(calls).toBe(1);
    expect(delays).toEqual([]);
  });
});
