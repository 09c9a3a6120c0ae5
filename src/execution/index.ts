export { ExecutionHarness } from "./harness.js";
export type { CodeExecutor, ExecutionRequest, ExecutionResult, HarnessOptions, Termination } from "./harness.js";
export { RUNTIME_IDS, RUNTIME_KINDS, DEFAULT_RUNTIMES, isRuntimeId } from "./runtimes.js";
export type { RuntimeId, RuntimeCommand } from "./runtimes.js";
export { BoundedOutput } from "./output.js";
