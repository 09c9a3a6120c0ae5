import { openai, createOpenAI } from "@ai-sdk/openai";
import { google } from "@ai-sdk/google";
import { anthropic } from "@ai-sdk/anthropic";
import { createAmazonBedrock } from "@ai-sdk/amazon-bedrock";
import type { LanguageModel } from "ai";

export const DEFAULT_PROVIDER = "anthropic";

/** Where a model is served, beyond the provider's own defaults. */
export interface ModelEndpoint {
    /** OpenAI-compatible server for the `custom` provider. */
    baseUrl?: string;
    /** Key for the `custom` provider only; hosted providers read their own variables. */
    apiKey?: string;
    /** Region for `bedrock`. Falls back to AWS_REGION, AWS_DEFAULT_REGION, then us-east-1. */
    awsRegion?: string;
}

/**
 * Name of the provider a call would use: explicit, then TASKLOOP_PROVIDER,
 * then `custom` when a base URL is configured, else the default.
 */
export function providerName(explicit?: string, baseUrl?: string): string {
    const provider = explicit || process.env.TASKLOOP_PROVIDER || (baseUrl ? "custom" : DEFAULT_PROVIDER);
    return provider.toLowerCase();
}

/**
 * Resolves a LanguageModel based on provider and model names.
 * Falls back to TASKLOOP_PROVIDER and TASKLOOP_MODEL environment variables.
 * Defaults to Anthropic claude-sonnet-4-5 if nothing is specified.
 */
export function resolveLanguageModel(
    providerId?: string,
    modelId?: string,
    endpoint: ModelEndpoint = {},
): LanguageModel {
    const provider = providerName(providerId, endpoint.baseUrl);
    const model = modelId || process.env.TASKLOOP_MODEL;

    switch (provider) {
        case "openai":
            return openai(model || "gpt-4o");
        case "google":
            return google(model || "gemini-1.5-pro");
        case "anthropic":
            return anthropic(model || "claude-sonnet-4-5");
        case "bedrock": {
            const region = endpoint.awsRegion
                || process.env.AWS_REGION
                || process.env.AWS_DEFAULT_REGION
                || "us-east-1";
            return createAmazonBedrock({ region })(model || "anthropic.claude-3-5-sonnet-20240620-v1:0");
        }
        case "custom": {
            if (!endpoint.baseUrl) {
                throw new Error("The custom provider needs a base URL (base_url / TASKLOOP_BASE_URL).");
            }
            if (!model) {
                throw new Error("The custom provider needs a model name (model / TASKLOOP_MODEL).");
            }
            // Self-hosted servers often take any key
            const server = createOpenAI({ baseURL: endpoint.baseUrl, apiKey: endpoint.apiKey || "EMPTY" });
            return server.chat(model);
        }
        default:
            throw new Error(`Unsupported LLM provider: ${provider}`);
    }
}

/**
 * Environment variables that supply credentials for each hosted provider.
 * Any one of a provider's variables is enough.
 */
export const PROVIDER_KEY_VARS: Readonly<Record<string, readonly string[]>> = {
    openai: ["OPENAI_API_KEY"],
    google: ["GOOGLE_GENERATIVE_AI_API_KEY"],
    anthropic: ["ANTHROPIC_API_KEY"],
    bedrock: ["AWS_ACCESS_KEY_ID", "AWS_BEARER_TOKEN_BEDROCK"],
};
