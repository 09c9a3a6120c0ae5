/**
 * Turn Controller: one Generate call, parsed, and (for actions) executed.
 *
 * Never appends to the transcript itself: it hands back the raw assistant
 * text plus the observation to record, and the agent loop owns the history.
 *
 * @see docs/architecture.md §4: Structured response grammar
 */
import type { LLMClient } from "../llm/client.js";
import type { CodeExecutor, ExecutionResult } from "../execution/harness.js";
import { ResponseParseError, RuntimeLaunchError } from "../errors/index.js";
import { parseResponse } from "./parser.js";
import type { ActionBlock, StructuredResponse } from "./parser.js";
import type { PromptPayload } from "./prompt.js";

type ActionResponse = Extract<StructuredResponse, { kind: "action" }>;
type AnswerResponse = Extract<StructuredResponse, { kind: "final_answer" }>;

export type TurnOutcome =
    | {
        kind: "action";
        raw: string;
        response: ActionResponse;
        /** Null when the runtime could not be launched. */
        execution: ExecutionResult | null;
        launchError?: RuntimeLaunchError;
        observation: string;
    }
    | {
        kind: "final_answer";
        raw: string;
        response: AnswerResponse;
    }
    | {
        kind: "parse_error";
        raw: string;
        error: ResponseParseError;
        observation: string;
    };

export interface TurnContext {
    workingDir: string;
    timeoutMs: number;
    temperature?: number;
    signal?: AbortSignal;
    /** Called once an action is parsed, just before it runs. */
    onAction?: (action: ActionBlock) => void;
}

function formatSeconds(ms: number): string {
    const seconds = ms / 1000;
    return Number.isInteger(seconds) ? `${seconds}s` : `${seconds.toFixed(1)}s`;
}

/**
 * Render an execution result as the text the model sees next turn.
 */
export function formatObservation(
    result: ExecutionResult,
    timeoutMs: number,
    ignoredActions = 0,
): string {
    const lines: string[] = [];

    if (result.termination === "timeout") {
        lines.push(`Execution timed out after ${formatSeconds(timeoutMs)} and was killed.`);
    } else if (result.termination === "cancelled") {
        lines.push("Execution was cancelled.");
    } else if (result.termination === "signaled") {
        lines.push(`Process was killed by ${result.signal ?? "a signal"}.`);
    }

    lines.push(`exit_code: ${result.exitCode ?? "none"}`);

    const stdout = result.stdout.replace(/\s+$/, "");
    const stderr = result.stderr.replace(/\s+$/, "");
    if (stdout) lines.push(`stdout:\n${stdout}`);
    if (stderr) lines.push(`stderr:\n${stderr}`);
    if (!stdout && !stderr) lines.push("(no output)");

    if (ignoredActions > 0) {
        lines.push(
            `Note: ${ignoredActions} further <execute> block(s) in your response were ignored. Only the first block runs.`,
        );
    }

    return lines.join("\n");
}

function launchObservation(err: RuntimeLaunchError): string {
    const hint = err.stage === "spawn"
        ? `The "${err.runtime}" runtime is unavailable on this host. Use another runtime.`
        : "The script could not be written to the working directory. Nothing was run.";
    return `${err.message}\n${hint}`;
}

export function formatParseError(error: ResponseParseError): string {
    return `Your previous response could not be processed (${error.code}): ${error.message}`;
}

export class TurnController {
    private llmClient: LLMClient;
    private executor: CodeExecutor;

    constructor(llmClient: LLMClient, executor: CodeExecutor) {
        this.llmClient = llmClient;
        this.executor = executor;
    }

    /**
     * Ask the model for its next step and carry it out.
     * Provider failures propagate; grammar violations come back as `parse_error`.
     */
    async runTurn(payload: PromptPayload, context: TurnContext): Promise<TurnOutcome> {
        const { text } = await this.llmClient.generateText(payload.system, payload.messages, {
            temperature: context.temperature,
            signal: context.signal,
        });

        let response: StructuredResponse;
        try {
            response = parseResponse(text);
        } catch (err) {
            if (!(err instanceof ResponseParseError)) throw err;
            return { kind: "parse_error", raw: text, error: err, observation: formatParseError(err) };
        }

        if (response.kind === "final_answer") {
            return { kind: "final_answer", raw: text, response };
        }

        context.onAction?.(response.action);

        try {
            const execution = await this.executor.execute({
                runtime: response.action.runtime,
                source: response.action.source,
                timeoutMs: context.timeoutMs,
                workingDir: context.workingDir,
                signal: context.signal,
            });
            return {
                kind: "action",
                raw: text,
                response,
                execution,
                observation: formatObservation(execution, context.timeoutMs, response.ignoredActions),
            };
        } catch (err) {
            if (!(err instanceof RuntimeLaunchError)) throw err;
            return {
                kind: "action",
                raw: text,
                response,
                execution: null,
                launchError: err,
                observation: launchObservation(err),
            };
        }
    }
}
