/**
 * Notes backend: turns a prepared prompt into generated notes.
 *
 * This module:
 * - Wraps the Vercel AI SDK's OpenAI provider
 * - Tries the Responses API first, then Chat Completions when the
 *   Responses API is unavailable (never for auth or rate-limit failures)
 * - Reports every attempt to an optional log hook
 */

import { generateText } from "ai";
import { createOpenAI } from "@ai-sdk/openai";
import { BackendError } from "../errors";
import { sanitizeMessages, type LlmLogEntry } from "../llm-log";
import type { PreparedPrompt } from "../notes/prepare";
import { classifyBackendError, type ClassifiedFailure } from "./classify";
import {
  createTransport,
  type Transport,
  type TransportConfig,
} from "./transport";
import type {
  BackendResult,
  GeneratedText,
  NotesBackend,
  NotesStrategy,
  TokenUsage,
} from "./types";

// ============================================================================
// OpenAI strategies
// ============================================================================

export interface OpenAIStrategyOptions {
  apiKey: string;
  modelId: string;
  temperature?: number;
  maxRetries?: number;
  baseURL?: string;
  fetch?: typeof globalThis.fetch;
}

/**
 * The two OpenAI API shapes, in the order they should be tried:
 * Responses (primary), then Chat Completions with the instruction as a
 * single user message (fallback).
 */
export function createOpenAIStrategies(
  options: OpenAIStrategyOptions
): NotesStrategy[] {
  const provider = createOpenAI({
    apiKey: options.apiKey,
    baseURL: options.baseURL,
    fetch: options.fetch,
  });
  const { modelId, temperature, maxRetries } = options;

  return [
    {
      name: "responses",
      mode: "primary",
      modelId,
      async generate(prompt: PreparedPrompt): Promise<GeneratedText> {
        const { text, usage } = await generateText({
          model: provider.responses(modelId),
          system: prompt.system,
          prompt: prompt.instruction,
          temperature,
          maxRetries,
        });
        return { text, usage: toTokenUsage(usage) };
      },
    },
    {
      name: "chat.completions",
      mode: "fallback",
      modelId,
      async generate(prompt: PreparedPrompt): Promise<GeneratedText> {
        const { text, usage } = await generateText({
          model: provider.chat(modelId),
          system: prompt.system,
          messages: [{ role: "user", content: prompt.instruction }],
          temperature,
          maxRetries,
        });
        return { text, usage: toTokenUsage(usage) };
      },
    },
  ];
}

function toTokenUsage(usage: {
  inputTokens?: number;
  outputTokens?: number;
}): TokenUsage | undefined {
  const inputTokens = usage.inputTokens ?? 0;
  const outputTokens = usage.outputTokens ?? 0;
  return inputTokens > 0 || outputTokens > 0
    ? { inputTokens, outputTokens }
    : undefined;
}

// ============================================================================
// Backend over ordered strategies
// ============================================================================

export interface StrategyBackendOptions {
  promptName?: string;
  onLog?: (entry: LlmLogEntry) => void;
  close?: () => Promise<void>;
}

type AttemptOutcome =
  | { ok: true; generated: GeneratedText }
  | { ok: false; failure: ClassifiedFailure };

/**
 * Try each strategy in order. A capability mismatch moves on to the next
 * strategy; any other failure stops and is surfaced.
 */
export function createStrategyBackend(
  strategies: NotesStrategy[],
  options: StrategyBackendOptions = {}
): NotesBackend {
  const promptName = options.promptName ?? "study_notes";

  async function attempt(
    strategy: NotesStrategy,
    prompt: PreparedPrompt
  ): Promise<AttemptOutcome> {
    try {
      const generated = await strategy.generate(prompt);
      if (generated.text.trim().length === 0) {
        return {
          ok: false,
          failure: {
            kind: "unknown",
            message: `${strategy.name} returned an empty response`,
            cause: undefined,
          },
        };
      }
      return { ok: true, generated };
    } catch (err) {
      return { ok: false, failure: classifyBackendError(err) };
    }
  }

  function writeLog(
    strategy: NotesStrategy,
    prompt: PreparedPrompt,
    attemptNumber: number,
    durationMs: number,
    outcome: AttemptOutcome
  ): void {
    if (!options.onLog) return;
    try {
      options.onLog({
        timestamp: new Date().toISOString(),
        taskType: "notes",
        promptName,
        modelId: strategy.modelId,
        backendMode: strategy.mode,
        attempt: attemptNumber,
        durationMs,
        usage: outcome.ok ? outcome.generated.usage : undefined,
        error: outcome.ok
          ? undefined
          : {
              kind: outcome.failure.kind,
              message: outcome.failure.message,
              statusCode: outcome.failure.statusCode,
            },
        system: prompt.system,
        messages: sanitizeMessages([
          { role: "user", content: prompt.instruction },
          ...(outcome.ok
            ? [{ role: "assistant", content: outcome.generated.text }]
            : []),
        ]),
      });
    } catch (err) {
      // A failing log hook is reported, not rethrown
      console.warn("LLM log hook failed:", err);
    }
  }

  return {
    async generate(prompt: PreparedPrompt): Promise<BackendResult> {
      let attemptNumber = 0;
      for (const strategy of strategies) {
        attemptNumber++;
        const t0 = Date.now();
        const outcome = await attempt(strategy, prompt);
        writeLog(strategy, prompt, attemptNumber, Date.now() - t0, outcome);

        if (outcome.ok) {
          return {
            text: outcome.generated.text.trim(),
            backendMode: strategy.mode,
            modelId: strategy.modelId,
            usage: outcome.generated.usage,
            attempts: attemptNumber,
          };
        }

        const { failure } = outcome;
        const hasNext = attemptNumber < strategies.length;
        if (failure.kind === "capability_mismatch" && hasNext) continue;

        throw attemptNumber === 1
          ? toBackendError(failure)
          : escalateFallbackFailure(strategy, failure);
      }
      throw new BackendError("unknown", "No backend strategy is configured");
    },
    close: options.close ?? (async () => {}),
  };
}

function toBackendError(failure: ClassifiedFailure): BackendError {
  return new BackendError(failure.kind, failure.message, {
    statusCode: failure.statusCode,
    cause: failure.cause,
  });
}

/**
 * Credential and rate-limit problems mean the same thing on every API
 * shape; anything else after a capability mismatch means no shape worked.
 */
function escalateFallbackFailure(
  strategy: NotesStrategy,
  failure: ClassifiedFailure
): BackendError {
  if (failure.kind === "auth" || failure.kind === "rate_limit") {
    return toBackendError(failure);
  }
  return new BackendError(
    "fallback_exhausted",
    `Primary API unavailable and ${strategy.name} fallback failed: ${failure.message}`,
    { statusCode: failure.statusCode, cause: failure.cause }
  );
}

// ============================================================================
// Factory
// ============================================================================

interface NotesBackendBaseOptions {
  apiKey: string;
  modelId: string;
  temperature?: number;
  maxRetries?: number;
  baseURL?: string;
  promptName?: string;
  onLog?: (entry: LlmLogEntry) => void;
}

/**
 * Either a config the backend builds (and later closes) its own transport
 * from, or a transport the caller owns and closes.
 */
export type CreateNotesBackendOptions = NotesBackendBaseOptions &
  (
    | { transportConfig: TransportConfig; transport?: undefined }
    | { transport: Transport; transportConfig?: undefined }
  );

/**
 * Create the OpenAI-backed notes backend. close() releases the transport's
 * connections when the backend built that transport itself.
 */
export function createNotesBackend(
  options: CreateNotesBackendOptions
): NotesBackend {
  const owned = options.transport === undefined;
  const transport =
    options.transport === undefined
      ? createTransport(options.transportConfig)
      : options.transport;
  const strategies = createOpenAIStrategies({
    apiKey: options.apiKey,
    modelId: options.modelId,
    temperature: options.temperature,
    maxRetries: options.maxRetries,
    baseURL: options.baseURL,
    fetch: transport.fetch,
  });

  return createStrategyBackend(strategies, {
    promptName: options.promptName,
    onLog: options.onLog,
    close: owned ? () => transport.close() : undefined,
  });
}
