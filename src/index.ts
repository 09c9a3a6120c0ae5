/**
 * taskloop: Public API
 *
 * An autonomous task-execution agent: a language model reasons, writes code,
 * runs it in a sandboxed subprocess and reads the result until it can answer.
 *
 * @see README.md for documentation index
 */

// Core
export {
    TaskAgent,
    parseResponse,
    assemblePrompt,
    BASE_INSTRUCTIONS,
    TurnController,
    formatObservation,
    formatParseError,
} from "./core/index.js";
export type {
    AgentEvents,
    AgentState,
    RunOptions,
    TaskAgentOptions,
    TaskState,
    ActionBlock,
    StructuredResponse,
    PromptPayload,
    TurnContext,
    TurnOutcome,
} from "./core/index.js";

// Agents
export {
    Critic,
    DEFAULT_CRITIC_PROMPT,
    ResourceSelector,
    fallbackSelection,
    DEFAULT_SELECTOR_PROMPT,
} from "./agents/index.js";
export type { CriticOptions, SelectorOptions } from "./agents/index.js";

// Catalog
export { ResourceCatalog, ResourceSelection, loadCatalog, licensedSubset } from "./catalog/index.js";

// Execution
export {
    ExecutionHarness,
    BoundedOutput,
    RUNTIME_IDS,
    RUNTIME_KINDS,
    DEFAULT_RUNTIMES,
    isRuntimeId,
} from "./execution/index.js";
export type {
    CodeExecutor,
    ExecutionRequest,
    ExecutionResult,
    HarnessOptions,
    Termination,
    RuntimeId,
    RuntimeCommand,
} from "./execution/index.js";

// Schemas
export {
    // Config
    AgentConfig,
    MAX_TIMEOUT_SECONDS,
    configFromEnv,
    resolveConfig,
    // Catalog
    RESOURCE_CATEGORIES,
    ResourceCategory,
    ResourceLicense,
    ResourceEntry,
    CatalogEntries,
    CatalogDocument,
    // Transcript
    TurnRole,
    Turn,
    AbortReason,
    SelectionSource,
    SelectionSummary,
    DoneResult,
    AbortedResult,
    TranscriptRecord,
    // Verdicts
    ResourceChoice,
    CritiqueVerdict,
} from "./schemas/index.js";
export type { AgentConfigInput, TaskResult } from "./schemas/index.js";

// Memory
export { TranscriptStore, TaskSummary } from "./memory/index.js";
export type { ListOptions } from "./memory/index.js";

// LLM
export { LLMClient, toProviderError } from "./llm/index.js";
export { resolveLanguageModel, providerName, PROVIDER_KEY_VARS, DEFAULT_PROVIDER } from "./llm/index.js";
export type { ModelEndpoint } from "./llm/index.js";
export type { ChatMessage, GenerateOptions, LLMClientOptions, ObjectResult, TextResult } from "./llm/index.js";

// Errors
export {
    ProviderError,
    ResponseParseError,
    RuntimeLaunchError,
    CatalogLoadError,
    TaskCancelledError,
    StructuredOutputError,
} from "./errors/index.js";
export type { ProviderErrorKind, ParseErrorCode, LaunchStage } from "./errors/index.js";

// Orchestration
export { runTaskBatch } from "./orchestrator.js";
export type { BatchOptions } from "./orchestrator.js";
