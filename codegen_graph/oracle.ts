import { HumanMessage, SystemMessage } from "@langchain/core/messages";
import type { MessageContent } from "@langchain/core/messages";
import { ChatOpenAI } from "@langchain/openai";
import { CodegenError, errorMessage, errorName, isCodegenError } from "./errors.js";
import type { GenerationRequest } from "./prompt.js";

/** The external text-generation capability: one request in, raw text out. */
export interface CodeSynthesisOracle {
  complete(request: GenerationRequest, options: { signal: AbortSignal }): Promise<string>;
}

export type RetryPolicy = {
  maxAttempts: number;
  initialBackoffMs: number;
  maxBackoffMs: number;
  attemptTimeoutMs: number;
};

export type SynthesisResult = {
  code: string;
  attempts: number;
};

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 4,
  initialBackoffMs: 1_000,
  maxBackoffMs: 30_000,
  attemptTimeoutMs: 120_000,
};

const OPENAI_COMPATIBLE_BASE_URLS: Record<string, string | undefined> = {
  openai: undefined,
  deepseek: "https://api.deepseek.com/v1",
};

// ---------------------------------------------------------------------------
// Oracle adapter
// ---------------------------------------------------------------------------

function messageText(content: MessageContent): string {
  if (typeof content === "string") {
    return content;
  }
  return content
    .map((part) => (part.type === "text" && typeof part.text === "string" ? part.text : ""))
    .join("");
}

/**
 * Builds an oracle from `provider/model` (for example `deepseek/deepseek-chat`).
 * API keys come from `<PROVIDER>_API_KEY`, falling back to `API_KEY`.
 */
export function createChatOracle(chatModel: string): CodeSynthesisOracle {
  const splitIndex = chatModel.indexOf("/");
  const provider = splitIndex >= 0 ? chatModel.slice(0, splitIndex) : "openai";
  const model = splitIndex >= 0 ? chatModel.slice(splitIndex + 1) : chatModel;

  if (!(provider in OPENAI_COMPATIBLE_BASE_URLS)) {
    throw new CodegenError("ConfigurationError", `Unsupported chat provider: ${provider}`);
  }

  const apiKey = process.env[`${provider.toUpperCase()}_API_KEY`] ?? process.env.API_KEY;
  if (!apiKey) {
    throw new CodegenError(
      "ConfigurationError",
      `Missing API key. Set ${provider.toUpperCase()}_API_KEY or API_KEY.`,
    );
  }

  const baseURL = process.env[`${provider.toUpperCase()}_API_URL`] ?? OPENAI_COMPATIBLE_BASE_URLS[provider];
  const chat = new ChatOpenAI({
    model,
    apiKey,
    temperature: 0,
    // Retries are governed by CodeSynthesisClient.
    maxRetries: 0,
    configuration: baseURL ? { baseURL } : undefined,
  });

  return {
    async complete(request, options) {
      const response = await chat.invoke(
        [new SystemMessage(request.system), new HumanMessage(request.user)],
        { signal: options.signal },
      );
      return messageText(response.content);
    },
  };
}

// ---------------------------------------------------------------------------
// Error classification
// ---------------------------------------------------------------------------

function numericProperty(error: object, key: string): number | undefined {
  const value: unknown = Reflect.get(error, key);
  return typeof value === "number" ? value : undefined;
}

export function classifyOracleError(error: unknown): CodegenError {
  if (isCodegenError(error)) {
    return error;
  }

  if (typeof error === "object" && error !== null) {
    const status = numericProperty(error, "status") ?? numericProperty(error, "statusCode");
    const lcCode: unknown = Reflect.get(error, "lc_error_code");
    const name = errorName(error);
    if (status === 429 || lcCode === "MODEL_RATE_LIMIT" || name === "RateLimitError") {
      return new CodegenError("OracleRateLimited", `Oracle rate limited: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  return new CodegenError("OracleUnavailable", `Oracle unavailable: ${errorMessage(error)}`, {
    cause: error,
  });
}

// ---------------------------------------------------------------------------
// Fenced block extraction
// ---------------------------------------------------------------------------

const FENCE_OPEN = /^ {0,3}(`{3,}|~{3,})\s*([^`\s]*)[^`]*$/;

function isClosingFence(line: string, fence: string): boolean {
  const trimmed = line.trim();
  return (
    trimmed.length >= fence.length &&
    trimmed.split("").every((char) => char === fence[0])
  );
}

function trimBlankLines(lines: string[]): string[] {
  let start = 0;
  let end = lines.length;
  while (start < end && lines[start].trim() === "") start++;
  while (end > start && lines[end - 1].trim() === "") end--;
  return lines.slice(start, end);
}

/**
 * Returns the body of the only fenced code block in `response`. Zero blocks,
 * several blocks, an unterminated block or an empty block are all rejected.
 */
export function extractSingleCodeBlock(response: string): string {
  const lines = response.replace(/\r\n/g, "\n").split("\n");
  const blocks: string[][] = [];
  let fence: string | null = null;
  let current: string[] = [];

  for (const line of lines) {
    if (fence === null) {
      const match = FENCE_OPEN.exec(line);
      if (match) {
        fence = match[1];
        current = [];
      }
      continue;
    }

    if (isClosingFence(line, fence)) {
      blocks.push(current);
      fence = null;
      continue;
    }
    current.push(line);
  }

  if (fence !== null) {
    throw new CodegenError("MalformedResponse", "Response has an unterminated code block");
  }
  if (blocks.length !== 1) {
    throw new CodegenError(
      "MalformedResponse",
      `Expected exactly one fenced code block, found ${blocks.length}`,
    );
  }

  const body = trimBlankLines(blocks[0]);
  if (body.length === 0) {
    throw new CodegenError("MalformedResponse", "Fenced code block is empty");
  }
  return `${body.join("\n")}\n`;
}

// ---------------------------------------------------------------------------
// Client with retry/backoff
// ---------------------------------------------------------------------------

export const abortableSleep: Sleep = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CodegenError("Cancelled", "Run cancelled"));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new CodegenError("Cancelled", "Run cancelled"));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });

export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return Math.min(policy.maxBackoffMs, policy.initialBackoffMs * 2 ** (attempt - 1));
}

function withAttempts(error: CodegenError, attempts: number): CodegenError {
  return new CodegenError(error.kind, error.message, { cause: error.cause, attempts });
}

export class CodeSynthesisClient {
  private readonly policy: RetryPolicy;
  private readonly sleep: Sleep;

  constructor(
    private readonly oracle: CodeSynthesisOracle,
    policy: Partial<RetryPolicy> = {},
    sleep: Sleep = abortableSleep,
  ) {
    this.policy = { ...DEFAULT_RETRY_POLICY, ...policy };
    this.sleep = sleep;
  }

  async synthesize(request: GenerationRequest, signal?: AbortSignal): Promise<SynthesisResult> {
    const maxAttempts = Math.max(1, this.policy.maxAttempts);

    for (let attempt = 1; ; attempt++) {
      if (signal?.aborted) {
        throw new CodegenError("Cancelled", "Run cancelled");
      }

      let response: string;
      try {
        response = await this.completeWithTimeout(request, signal);
      } catch (error) {
        const failure = classifyOracleError(error);
        if (!failure.retryable || attempt >= maxAttempts) {
          throw withAttempts(failure, attempt);
        }
        await this.sleep(backoffDelay(this.policy, attempt), signal);
        continue;
      }

      try {
        return { code: extractSingleCodeBlock(response), attempts: attempt };
      } catch (error) {
        throw withAttempts(classifyOracleError(error), attempt);
      }
    }
  }

  private async completeWithTimeout(
    request: GenerationRequest,
    signal?: AbortSignal,
  ): Promise<string> {
    const controller = new AbortController();
    const timeoutMs = this.policy.attemptTimeoutMs;
    let rejectAttempt: (error: CodegenError) => void = () => undefined;
    const aborted = new Promise<never>((_resolve, reject) => {
      rejectAttempt = reject;
    });

    const timer = setTimeout(() => {
      const error = new CodegenError("OracleUnavailable", `Oracle timed out after ${timeoutMs}ms`);
      rejectAttempt(error);
      controller.abort(error);
    }, timeoutMs);
    const onRunAbort = () => {
      const error = new CodegenError("Cancelled", "Run cancelled");
      rejectAttempt(error);
      controller.abort(error);
    };
    signal?.addEventListener("abort", onRunAbort, { once: true });

    try {
      return await Promise.race([
        this.oracle.complete(request, { signal: controller.signal }),
        aborted,
      ]);
    } catch (error) {
      // An oracle that rejects on abort can settle first; report the abort reason.
      const reason: unknown = controller.signal.reason;
      if (controller.signal.aborted && isCodegenError(reason)) {
        throw reason;
      }
      throw error;
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onRunAbort);
    }
  }
}
