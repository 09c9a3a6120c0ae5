/**
 * Test helpers: scripted language models and canned execution results.
 *
 * Models are the AI SDK's MockLanguageModelV2 wrapped in the real LLMClient,
 * so error translation and abort handling run exactly as in production.
 */
import { MockLanguageModelV2 } from "ai/test";
import { LLMClient } from "../llm/client.js";
import type { ExecutionResult } from "../execution/harness.js";
import { resolveConfig } from "../schemas/config.js";
import type { AgentConfig, AgentConfigInput } from "../schemas/config.js";

/**
 * A model that answers with each scripted reply in turn, repeating the last
 * one once the script runs out. An Error entry is thrown instead.
 */
export function scriptedModel(replies: ReadonlyArray<string | Error>): MockLanguageModelV2 {
    let call = 0;
    return new MockLanguageModelV2({
        doGenerate: async () => {
            const reply = replies[Math.min(call, replies.length - 1)];
            call++;
            if (reply instanceof Error) throw reply;
            return {
                content: [{ type: "text", text: reply }],
                finishReason: "stop",
                usage: { inputTokens: 10, outputTokens: 5, totalTokens: 15 },
                warnings: [],
            };
        },
    });
}

/**
 * A model that picks its reply by how many assistant turns the conversation
 * already holds, so concurrent conversations each follow the script.
 */
export function conversationModel(replies: readonly string[]): MockLanguageModelV2 {
    return new MockLanguageModelV2({
        doGenerate: async ({ prompt }) => {
            const turn = prompt.filter((message) => message.role === "assistant").length;
            return {
                content: [{ type: "text", text: replies[Math.min(turn, replies.length - 1)] }],
                finishReason: "stop",
                usage: { inputTokens: 10, outputTokens: 5, totalTokens: 15 },
                warnings: [],
            };
        },
    });
}

/** LLMClient over a scripted model, without SDK retries. */
export function scriptedClient(replies: ReadonlyArray<string | Error>): LLMClient {
    return new LLMClient(scriptedModel(replies), { maxRetries: 0 });
}

export function exitedResult(overrides: Partial<ExecutionResult> = {}): ExecutionResult {
    return {
        runtime: "python",
        stdout: "",
        stderr: "",
        exitCode: 0,
        signal: null,
        termination: "exited",
        timedOut: false,
        killed: false,
        durationMs: 5,
        truncated: false,
        ...overrides,
    };
}

/** Config from defaults plus overrides, ignoring the real environment. */
export function testConfig(overrides: AgentConfigInput = {}): AgentConfig {
    return resolveConfig({ use_resource_selector: false, ...overrides }, {});
}
