/**
 * Custom Error Classes: typed failures that cross module boundaries.
 * @see docs/error_handling.md: Error taxonomy
 */

/** Classification of a language-model provider failure. */
export type ProviderErrorKind =
    | "auth"
    | "rate_limit"
    | "quota"
    | "transient"
    | "invalid_request"
    | "unknown";

/**
 * Thrown by the LLM client when a provider call fails after the client's own
 * retry budget. Raw SDK errors never leave the client; this is what the agent
 * loop sees.
 * @see docs/error_handling.md §3: Provider errors
 */
export class ProviderError extends Error {
    public readonly kind: ProviderErrorKind;
    public readonly statusCode?: number;
    public readonly retryable: boolean;

    constructor(
        kind: ProviderErrorKind,
        message: string,
        options: { statusCode?: number; retryable?: boolean; cause?: unknown } = {},
    ) {
        super(`Provider error (${kind}): ${message}`, { cause: options.cause });
        this.name = "ProviderError";
        this.kind = kind;
        this.statusCode = options.statusCode;
        this.retryable = options.retryable ?? false;
    }
}

/** Reason a model response did not match the block grammar. */
export type ParseErrorCode =
    | "missing_block"
    | "conflicting_blocks"
    | "unterminated_block"
    | "missing_runtime"
    | "unknown_runtime"
    | "empty_action"
    | "empty_answer";

/**
 * Thrown when an assistant response is malformed. The message is written for
 * the model: the turn controller feeds it back verbatim as an observation.
 * @see docs/error_handling.md §1: Parse errors
 */
export class ResponseParseError extends Error {
    public readonly code: ParseErrorCode;

    constructor(code: ParseErrorCode, message: string) {
        super(message);
        this.name = "ResponseParseError";
        this.code = code;
    }
}

/** `setup`: the script file or its directory could not be prepared. `spawn`: the interpreter did not start. */
export type LaunchStage = "setup" | "spawn";

/**
 * Thrown by the execution harness when a snippet cannot be started at all.
 * Failures inside the executed code are reported in the ExecutionResult instead.
 */
export class RuntimeLaunchError extends Error {
    public readonly runtime: string;
    public readonly command: string;
    public readonly code?: string;
    public readonly stage: LaunchStage;

    constructor(runtime: string, command: string, cause: NodeJS.ErrnoException, stage: LaunchStage = "spawn") {
        super(
            stage === "spawn"
                ? `Cannot launch runtime "${runtime}" (${command}): ${cause.message}`
                : `Cannot prepare a "${runtime}" script: ${cause.message}`,
            { cause },
        );
        this.name = "RuntimeLaunchError";
        this.runtime = runtime;
        this.command = command;
        this.code = cause.code;
        this.stage = stage;
    }
}

/** Thrown when a resource catalog file is unreadable or fails validation. */
export class CatalogLoadError extends Error {
    public readonly source: string;

    constructor(source: string, reason: string, cause?: unknown) {
        super(`Failed to load resource catalog from ${source}: ${reason}`, { cause });
        this.name = "CatalogLoadError";
        this.source = source;
    }
}

/** Thrown inside a task run once the caller's abort signal fires. */
export class TaskCancelledError extends Error {
    public readonly taskId: string;

    constructor(taskId: string) {
        super(`Task "${taskId}" was cancelled.`);
        this.name = "TaskCancelledError";
        this.taskId = taskId;
    }
}

/**
 * Thrown when a structured LLM call returns output that fails its schema.
 * The provider worked; the model's answer did not.
 */
export class StructuredOutputError extends Error {
    public readonly text?: string;

    constructor(message: string, text?: string, cause?: unknown) {
        super(`Model output failed validation: ${message}`, { cause });
        this.name = "StructuredOutputError";
        this.text = text;
    }
}
