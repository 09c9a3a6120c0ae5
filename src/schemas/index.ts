/**
 * Schema barrel export: all Zod schemas and inferred types.
 */

// Configuration
export { AgentConfig, MAX_TIMEOUT_SECONDS, configFromEnv, resolveConfig } from "./config.js";
export type { AgentConfigInput } from "./config.js";

// Catalog
export {
    RESOURCE_CATEGORIES,
    ResourceCategory,
    ResourceLicense,
    ResourceEntry,
    CatalogEntries,
    CatalogDocument,
} from "./catalog.js";

// Transcript
export {
    TurnRole,
    Turn,
    AbortReason,
    SelectionSource,
    SelectionSummary,
    DoneResult,
    AbortedResult,
    TranscriptRecord,
} from "./transcript.js";
export type { TaskResult } from "./transcript.js";

// Verdicts
export { ResourceChoice, CritiqueVerdict } from "./verdicts.js";
