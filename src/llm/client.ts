/**
 * LLM Client: Thin wrapper around the Vercel AI SDK.
 *
 * The Vercel AI SDK (`ai` package) provides:
 *  - Provider-agnostic model interface (OpenAI, Anthropic, Google, local)
 *  - Built-in `generateObject()` with native Zod schema validation
 *  - Retries with exponential backoff for transient provider failures
 *
 * This wrapper owns the provider boundary: every call is bounded by a timeout
 * plus the caller's abort signal, and failures leave as `ProviderError` or
 * `StructuredOutputError`. A caller abort is rethrown unchanged.
 */
import type { LanguageModel, ModelMessage } from "ai";
import {
    APICallError,
    LoadAPIKeyError,
    LoadSettingError,
    NoObjectGeneratedError,
    RetryError,
    generateObject,
    generateText,
} from "ai";
import type { ZodType } from "zod/v4";
import { ProviderError, StructuredOutputError } from "../errors/index.js";
import type { ProviderErrorKind } from "../errors/index.js";

/** Options for an LLM generation request. */
export interface GenerateOptions {
    /** Override the default model for this request. */
    model?: LanguageModel;
    temperature?: number;
    /** Caller cancellation. */
    signal?: AbortSignal;
}

/** Construction options for the client. */
export interface LLMClientOptions {
    /** Retries for transient failures inside one call. Default: 5 */
    maxRetries?: number;
    /** Per-call timeout. Default: 300000 */
    timeoutMs?: number;
}

/** A conversation message as the agent loop sends it. */
export interface ChatMessage {
    role: "user" | "assistant";
    content: string;
}

/** Result of a text generation (free-form). */
export interface TextResult {
    text: string;
    tokenUsage: number;
}

/** Result of a structured object generation (Zod-validated). */
export interface ObjectResult<T> {
    object: T;
    tokenUsage: number;
}

function toModelMessage(message: ChatMessage): ModelMessage {
    return message.role === "user"
        ? { role: "user", content: message.content }
        : { role: "assistant", content: message.content };
}

function classifyStatus(
    statusCode: number | undefined,
    message: string,
    retryable: boolean,
): ProviderErrorKind {
    if (statusCode === 401 || statusCode === 403) return "auth";
    if (statusCode === 402 || /quota|billing/i.test(message)) return "quota";
    if (statusCode === 429) return "rate_limit";
    if (retryable || (statusCode !== undefined && statusCode >= 500)) return "transient";
    if (statusCode !== undefined && statusCode >= 400) return "invalid_request";
    return "unknown";
}

/**
 * Translate an SDK failure into a ProviderError.
 * A RetryError is unwrapped to the last attempt's error.
 */
export function toProviderError(err: unknown): ProviderError {
    if (err instanceof ProviderError) return err;
    const cause = RetryError.isInstance(err) ? err.lastError : err;

    // Missing API key, or missing AWS credentials for Bedrock
    if (LoadAPIKeyError.isInstance(cause) || LoadSettingError.isInstance(cause)) {
        return new ProviderError("auth", cause.message, { cause: err });
    }
    if (APICallError.isInstance(cause)) {
        return new ProviderError(
            classifyStatus(cause.statusCode, cause.message, cause.isRetryable),
            cause.message,
            { statusCode: cause.statusCode, retryable: cause.isRetryable, cause: err },
        );
    }
    if (cause instanceof Error && cause.name === "TimeoutError") {
        return new ProviderError("transient", "request timed out", { retryable: true, cause: err });
    }
    const message = cause instanceof Error ? cause.message : String(cause);
    return new ProviderError("unknown", message, { cause: err });
}

/**
 * LLM client wrapping Vercel AI SDK's generateText/generateObject.
 * The agent loop, selector and critic hold a reference to this client.
 */
export class LLMClient {
    public readonly model: LanguageModel;
    private readonly maxRetries: number;
    private readonly timeoutMs: number;

    constructor(model: LanguageModel, options: LLMClientOptions = {}) {
        this.model = model;
        this.maxRetries = options.maxRetries ?? 5;
        this.timeoutMs = options.timeoutMs ?? 300_000;
    }

    /**
     * Generate a free-form text response to a conversation.
     */
    async generateText(
        system: string,
        messages: readonly ChatMessage[],
        options?: GenerateOptions,
    ): Promise<TextResult> {
        try {
            const result = await generateText({
                model: options?.model ?? this.model,
                system,
                messages: messages.map(toModelMessage),
                temperature: options?.temperature ?? 0.7,
                maxRetries: this.maxRetries,
                abortSignal: this.callSignal(options?.signal),
            });

            return {
                text: result.text,
                tokenUsage: result.usage.totalTokens ?? 0,
            };
        } catch (err) {
            if (options?.signal?.aborted) throw err;
            throw toProviderError(err);
        }
    }

    /**
     * Generate a structured object validated against a Zod schema.
     * Uses the Vercel AI SDK's native `generateObject`, never a manual JSON.parse().
     */
    async generateObject<T>(
        schema: ZodType<T>,
        system: string,
        prompt: string,
        options?: GenerateOptions,
    ): Promise<ObjectResult<T>> {
        try {
            const result = await generateObject({
                model: options?.model ?? this.model,
                schema,
                system,
                prompt,
                temperature: options?.temperature ?? 0.7,
                maxRetries: this.maxRetries,
                abortSignal: this.callSignal(options?.signal),
            });

            return {
                object: result.object as T,
                tokenUsage: result.usage.totalTokens ?? 0,
            };
        } catch (err) {
            if (options?.signal?.aborted) throw err;
            if (NoObjectGeneratedError.isInstance(err)) {
                throw new StructuredOutputError(err.message, err.text, err);
            }
            throw toProviderError(err);
        }
    }

    private callSignal(signal: AbortSignal | undefined): AbortSignal {
        const timeout = AbortSignal.timeout(this.timeoutMs);
        return signal ? AbortSignal.any([signal, timeout]) : timeout;
    }
}
