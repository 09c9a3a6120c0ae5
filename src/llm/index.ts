export { LLMClient, toProviderError } from "./client.js";
export type { ChatMessage, GenerateOptions, LLMClientOptions, ObjectResult, TextResult } from "./client.js";
export { resolveLanguageModel, providerName, PROVIDER_KEY_VARS, DEFAULT_PROVIDER } from "./resolve.js";
export type { ModelEndpoint } from "./resolve.js";
