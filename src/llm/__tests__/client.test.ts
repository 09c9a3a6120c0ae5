/**
 * LLMClient Tests: provider error translation and the abort boundary,
 * driven through the AI SDK's mock language model.
 */
import { describe, it, expect } from "vitest";
import { APICallError, LoadAPIKeyError, LoadSettingError, RetryError } from "ai";
import { MockLanguageModelV2 } from "ai/test";
import { z } from "zod/v4";
import { LLMClient, toProviderError } from "../client.js";
import type { ChatMessage } from "../client.js";
import { ProviderError, StructuredOutputError } from "../../errors/index.js";
import { scriptedClient, scriptedModel } from "../../__tests__/helpers.js";

const HI: ChatMessage[] = [{ role: "user", content: "hi" }];

function apiError(statusCode: number | undefined, message = "request failed", isRetryable = false): APICallError {
    return new APICallError({
        message,
        url: "https://api.example.test/v1/chat",
        requestBodyValues: {},
        statusCode,
        isRetryable,
    });
}

describe("toProviderError()", () => {
    it.each([
        [401, "auth"],
        [403, "auth"],
        [402, "quota"],
        [429, "rate_limit"],
        [500, "transient"],
        [503, "transient"],
        [400, "invalid_request"],
        [404, "invalid_request"],
    ])("classifies HTTP %i as %s", (status, kind) => {
        expect(toProviderError(apiError(status)).kind).toBe(kind);
    });

    it("classifies quota wording as quota", () => {
        expect(toProviderError(apiError(400, "You exceeded your current quota")).kind).toBe("quota");
    });

    it("classifies retryable network failures as transient", () => {
        const err = toProviderError(apiError(undefined, "fetch failed", true));
        expect(err.kind).toBe("transient");
        expect(err.retryable).toBe(true);
    });

    it("classifies a missing API key as auth", () => {
        const err = toProviderError(new LoadAPIKeyError({ message: "OPENAI_API_KEY is missing" }));
        expect(err.kind).toBe("auth");
    });

    it("classifies missing AWS credentials as auth", () => {
        const err = toProviderError(new LoadSettingError({ message: "AWS access key ID setting is missing" }));
        expect(err.kind).toBe("auth");
        expect(err.message).toBe("Provider error (auth): AWS access key ID setting is missing");
    });

    it("unwraps the last attempt of a RetryError", () => {
        const last = apiError(503, "overloaded", true);
        const retry = new RetryError({ message: "gave up", reason: "maxRetriesExceeded", errors: [last, last] });

        const err = toProviderError(retry);

        expect(err.kind).toBe("transient");
        expect(err.statusCode).toBe(503);
        expect(err.message).toBe("Provider error (transient): overloaded");
        expect(err.cause).toBe(retry);
    });

    it("passes ProviderErrors through unchanged", () => {
        const original = new ProviderError("auth", "bad key");
        expect(toProviderError(original)).toBe(original);
    });

    it("falls back to unknown", () => {
        expect(toProviderError(new Error("weird")).kind).toBe("unknown");
    });
});

describe("LLMClient.generateText()", () => {
    it("returns the text and token usage", async () => {
        const result = await scriptedClient(["<solution>4</solution>"]).generateText("sys", [
            { role: "user", content: "2 + 2?" },
        ]);

        expect(result).toEqual({ text: "<solution>4</solution>", tokenUsage: 15 });
    });

    it("sends the system prompt, messages and temperature to the model", async () => {
        const model = scriptedModel(["ok"]);
        const client = new LLMClient(model, { maxRetries: 0 });

        await client.generateText(
            "be brief",
            [
                { role: "user", content: "hi" },
                { role: "assistant", content: "hello" },
                { role: "user", content: "again" },
            ],
            { temperature: 0.2 },
        );

        const call = model.doGenerateCalls[0];
        expect(call.temperature).toBe(0.2);
        expect(call.prompt.map((message) => message.role)).toEqual(["system", "user", "assistant", "user"]);
        expect(call.prompt[0]).toMatchObject({ role: "system", content: "be brief" });
    });

    it("translates provider failures", async () => {
        const failure = scriptedClient([apiError(401, "Invalid API key")]).generateText("sys", HI);

        await expect(failure).rejects.toBeInstanceOf(ProviderError);
        await expect(failure).rejects.toMatchObject({ kind: "auth", statusCode: 401 });
    });

    it("rethrows a caller abort untranslated", async () => {
        const model = new MockLanguageModelV2({
            doGenerate: async ({ abortSignal }) => {
                throw abortSignal?.reason ?? new Error("signal was not aborted");
            },
        });
        const controller = new AbortController();
        controller.abort();

        const failure = new LLMClient(model, { maxRetries: 0 }).generateText("sys", HI, { signal: controller.signal });

        await expect(failure).rejects.not.toBeInstanceOf(ProviderError);
        await expect(failure).rejects.toMatchObject({ name: "AbortError" });
    });

    it("reports its own timeout as a transient provider error", async () => {
        const model = new MockLanguageModelV2({
            doGenerate: ({ abortSignal }) => new Promise((_, reject) => {
                abortSignal?.addEventListener("abort", () => reject(abortSignal.reason), { once: true });
            }),
        });

        const failure = new LLMClient(model, { maxRetries: 0, timeoutMs: 50 }).generateText("sys", HI);

        await expect(failure).rejects.toMatchObject({ name: "ProviderError", kind: "transient" });
    });
});

describe("LLMClient.generateObject()", () => {
    const Answer = z.object({ value: z.number() });

    it("returns the validated object", async () => {
        const result = await scriptedClient([JSON.stringify({ value: 7 })]).generateObject(Answer, "sys", "prompt");

        expect(result.object).toEqual({ value: 7 });
        expect(result.tokenUsage).toBe(15);
    });

    it("raises StructuredOutputError for output that fails the schema", async () => {
        const failure = scriptedClient([JSON.stringify({ value: "seven" })]).generateObject(Answer, "sys", "prompt");

        await expect(failure).rejects.toBeInstanceOf(StructuredOutputError);
        await expect(failure).rejects.toMatchObject({ text: JSON.stringify({ value: "seven" }) });
    });
});
