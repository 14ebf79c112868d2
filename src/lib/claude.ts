import Anthropic from "@anthropic-ai/sdk";
import { jsonrepair } from "jsonrepair";
import type { CallUsage, ModelRequest, ModelResponse, TextModel } from "@/types";
import type { PipelineConfig } from "@/lib/config";
import { requireApiKey } from "@/lib/config";
import { CollaboratorError, MalformedResponseError, errorMessage } from "@/lib/errors";
import { sleep } from "@/lib/utils";

// ── Pricing ─────────────────────────────────────────────────────────────────

const PRICING: Record<string, { input: number; output: number }> = {
  "claude-opus-4-20250514": { input: 15.0, output: 75.0 },
  "claude-sonnet-4-20250514": { input: 3.0, output: 15.0 },
};

export function computeCost(model: string, inputTokens: number, outputTokens: number): number {
  const p = PRICING[model] || PRICING["claude-sonnet-4-20250514"];
  return (inputTokens * p.input + outputTokens * p.output) / 1_000_000;
}

// ── Usage tracking ──────────────────────────────────────────────────────────

export class UsageTracker {
  calls = 0;
  inputTokens = 0;
  outputTokens = 0;
  costUsd = 0;
  durationMs = 0;

  track(usage: CallUsage): void {
    this.calls++;
    this.inputTokens += usage.inputTokens;
    this.outputTokens += usage.outputTokens;
    this.costUsd += usage.costUsd;
    this.durationMs += usage.durationMs;
  }
}

// ── Claude client ───────────────────────────────────────────────────────────

interface StreamRequest {
  model: string;
  max_tokens: number;
  system?: string;
  temperature?: number;
  messages: Anthropic.MessageParam[];
}

/** The slice of the Anthropic client this module uses. */
export interface ClaudeClient {
  messages: {
    stream(params: StreamRequest): {
      on(event: "text", listener: (text: string) => void): unknown;
      finalMessage(): Promise<{ usage: { input_tokens: number; output_tokens: number } }>;
    };
  };
}

function statusOf(err: unknown): number | undefined {
  if (typeof err === "object" && err !== null && "status" in err && typeof err.status === "number") {
    return err.status;
  }
  return undefined;
}

/**
 * Build the pipeline's model collaborator on top of Claude.
 *
 * Each call streams the response and drains it before returning, so callers
 * always get the complete text. 429s are retried with exponential back-off;
 * every other failure surfaces as a CollaboratorError.
 */
export function createClaudeModel(
  config: PipelineConfig,
  options: { client?: ClaudeClient; tracker?: UsageTracker } = {},
): TextModel {
  const client: ClaudeClient = options.client ?? new Anthropic({ apiKey: requireApiKey(config) });
  const tracker = options.tracker;

  return async (request: ModelRequest): Promise<ModelResponse> => {
    const t0 = Date.now();

    const content: Anthropic.ContentBlockParam[] = [];
    for (const img of request.images ?? []) {
      content.push({
        type: "image",
        source: { type: "base64", media_type: img.mediaType, data: img.base64 },
      });
    }
    content.push({ type: "text", text: request.prompt });

    for (let attempt = 0; attempt <= config.maxRetries; attempt++) {
      let text = "";
      try {
        const stream = client.messages.stream({
          model: config.model,
          max_tokens: request.maxTokens ?? 8192,
          ...(request.system ? { system: request.system } : {}),
          ...(request.temperature !== undefined ? { temperature: request.temperature } : {}),
          messages: [{ role: "user", content }],
        });
        stream.on("text", (chunk) => { text += chunk; });

        const message = await stream.finalMessage();

        if (!text) {
          throw new CollaboratorError("Claude returned no text response");
        }

        const inputTokens = message.usage.input_tokens;
        const outputTokens = message.usage.output_tokens;
        const usage: CallUsage = {
          inputTokens,
          outputTokens,
          costUsd: computeCost(config.model, inputTokens, outputTokens),
          durationMs: Date.now() - t0,
        };
        tracker?.track(usage);

        return { text, usage };
      } catch (err: unknown) {
        if (statusOf(err) === 429 && attempt < config.maxRetries) {
          const waitMs = config.retryBaseMs * Math.pow(2, attempt);
          console.log(`  Rate limited. Waiting ${waitMs / 1000}s...`);
          await sleep(waitMs);
          continue;
        }
        if (err instanceof CollaboratorError) throw err;
        throw new CollaboratorError(`Claude request failed: ${errorMessage(err)}`, {
          cause: err,
          partialText: text,
        });
      }
    }
    throw new CollaboratorError("Exhausted rate-limit retries");
  };
}

// ── Response cleanup ────────────────────────────────────────────────────────

/** Remove a wrapping ```lang fence from a plain-text response. */
export function stripMarkdownFences(raw: string): string {
  return raw
    .trim()
    .replace(/^```[a-z]*\s*\n?/i, "")
    .replace(/\n?\s*```\s*$/, "")
    .trim();
}

const FENCE_OPEN = /^```(?:json)?\s*\n?/m;
const FENCE_CLOSE = /\n?\s*```\s*$/m;
const TRAILING_COMMA = /,\s*([}\]])/g;

/**
 * The part of a model response that should hold the JSON value: formatting
 * fences go, as does any prose before the first bracket or after the last.
 */
export function jsonSpan(raw: string): string {
  const unfenced = raw.trim().replace(FENCE_OPEN, "").replace(FENCE_CLOSE, "");
  const start = unfenced.search(/[{[]/);
  const end = Math.max(unfenced.lastIndexOf("}"), unfenced.lastIndexOf("]"));
  return start >= 0 && end > start ? unfenced.slice(start, end + 1) : unfenced;
}

/**
 * Parse the JSON value out of a model response. Trailing commas are dropped,
 * and jsonrepair gets one try before the response counts as malformed; the
 * error keeps both the full response and the span that was tried.
 */
export function extractJson(raw: string): unknown {
  const span = jsonSpan(raw).replace(TRAILING_COMMA, "$1");
  try {
    return JSON.parse(span);
  } catch (parseErr) {
    let value: unknown;
    try {
      value = JSON.parse(jsonrepair(span));
    } catch (repairErr) {
      throw new MalformedResponseError(`Response is not valid JSON: ${errorMessage(repairErr)}`, raw, {
        cause: repairErr,
        attempted: span,
      });
    }
    console.log(`  Repaired model JSON (${errorMessage(parseErr)})`);
    return value;
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
