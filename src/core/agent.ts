/**
 * TaskAgent: the control loop that drives one task from goal to answer.
 *
 * Owns the state machine (select → generate ⇄ execute → critique → done /
 * aborted), enforces the iteration ceiling and the parse-retry budget, and
 * emits typed events for logging. All per-task state lives in a TaskState
 * created by `run()`, so one agent can serve concurrent runs.
 *
 * @see docs/architecture.md §1: Control loop
 * @see docs/error_handling.md: Error taxonomy
 */
import { EventEmitter } from "events";
import fs from "fs/promises";
import os from "os";
import path from "path";
import { v4 as uuidv4 } from "uuid";
import type { AgentConfig } from "../schemas/config.js";
import type { AbortReason, TaskResult, Turn, TurnRole } from "../schemas/transcript.js";
import type { CritiqueVerdict } from "../schemas/verdicts.js";
import type { LLMClient } from "../llm/client.js";
import { ResourceSelection, licensedSubset } from "../catalog/catalog.js";
import type { ResourceCatalog } from "../catalog/catalog.js";
import { ExecutionHarness } from "../execution/harness.js";
import type { CodeExecutor, ExecutionResult } from "../execution/harness.js";
import { Critic } from "../agents/critic.js";
import { ResourceSelector } from "../agents/selector.js";
import { ProviderError, TaskCancelledError } from "../errors/index.js";
import { assemblePrompt } from "./prompt.js";
import { TurnController } from "./turn.js";
import type { StructuredResponse } from "./parser.js";

export type AgentState = "select" | "generate" | "execute" | "critique" | "done" | "aborted";

/** Events emitted by a TaskAgent. Every payload names its task. */
export interface AgentEvents {
    "task:start": [{ taskId: string; task: string }];
    "selection:complete": [{ taskId: string; selection: ResourceSelection }];
    "state:change": [{ taskId: string; from: AgentState; to: AgentState; iteration: number }];
    "turn:appended": [{ taskId: string; turn: Turn }];
    "execution:complete": [{ taskId: string; result: ExecutionResult }];
    "critique:verdict": [{ taskId: string; verdict: CritiqueVerdict; round: number }];
    "task:complete": [{ taskId: string; result: TaskResult }];
}

/** Mutable state of a single run. Discarded when the run ends. */
export interface TaskState {
    taskId: string;
    task: string;
    phase: AgentState;
    history: Turn[];
    /** Generate calls made so far. */
    iteration: number;
    /** Consecutive malformed responses; reset by any well-formed one. */
    parseFailures: number;
    /** Rejections received from the critic. */
    critiqueRounds: number;
    isTerminal: boolean;
    lastResponse?: StructuredResponse;
    lastVerdict?: CritiqueVerdict;
    /** Latest answer the model proposed, accepted or not. */
    proposedAnswer?: string;
    lastReasoning?: string;
}

export interface TaskAgentOptions {
    config: AgentConfig;
    llm: LLMClient;
    catalog: ResourceCatalog;
    harness?: CodeExecutor;
    selector?: ResourceSelector;
    /** Used only when `critique_enabled` is set. */
    critic?: Critic;
}

export interface RunOptions {
    signal?: AbortSignal;
    taskId?: string;
}

interface RunContext {
    state: TaskState;
    selection: ResourceSelection;
    workingDir: string;
    signal?: AbortSignal;
}

export class TaskAgent extends EventEmitter<AgentEvents> {
    public readonly config: AgentConfig;
    private catalog: ResourceCatalog;
    private selector: ResourceSelector;
    private critic?: Critic;
    private turns: TurnController;

    constructor(options: TaskAgentOptions) {
        super();
        this.config = options.config;
        this.catalog = licensedSubset(options.catalog, options.config.commercial_mode);
        this.selector = options.selector
            ?? new ResourceSelector(options.llm, { temperature: options.config.selector_temperature });
        if (options.config.critique_enabled) {
            this.critic = options.critic
                ?? new Critic(options.llm, { temperature: options.config.critic_temperature });
        }
        const harness = options.harness
            ?? new ExecutionHarness({ maxOutputBytes: options.config.max_output_bytes });
        this.turns = new TurnController(options.llm, harness);
    }

    /**
     * Run one task to completion. Always resolves with a TaskResult; errors
     * other than provider failures and cancellation end it as `internal_error`.
     */
    async run(task: string, options: RunOptions = {}): Promise<TaskResult> {
        const state = createTaskState(options.taskId ?? uuidv4(), task);
        const signal = options.signal;
        this.emit("task:start", { taskId: state.taskId, task });
        this.append(state, "user", task);

        let scratchDir: string | undefined;
        let selection = new ResourceSelection([], "all");

        try {
            const workingDir = await this.prepareWorkingDir(state.taskId);
            if (!this.config.working_dir) scratchDir = workingDir;

            throwIfCancelled(state, signal);
            selection = await this.selectResources(task, signal);
            this.emit("selection:complete", { taskId: state.taskId, selection });

            const result = await this.loop({ state, selection, workingDir, signal });
            return this.complete(result);
        } catch (err) {
            if (err instanceof TaskCancelledError || signal?.aborted) {
                return this.complete(this.abort(state, selection, "cancelled", "The task was cancelled by the caller."));
            }
            if (err instanceof ProviderError) {
                return this.complete(this.abort(state, selection, "provider_fatal", err.message));
            }
            const message = err instanceof Error ? err.message : String(err);
            return this.complete(this.abort(state, selection, "internal_error", message));
        } finally {
            if (scratchDir) await fs.rm(scratchDir, { recursive: true, force: true });
        }
    }

    /** One directory per task: `<working_dir>/<taskId>`, kept afterwards, or a scratch dir. */
    private async prepareWorkingDir(taskId: string): Promise<string> {
        if (this.config.working_dir) {
            const dir = path.join(this.config.working_dir, taskId.replace(/[^\w.-]/g, "_"));
            await fs.mkdir(dir, { recursive: true });
            return dir;
        }
        return fs.mkdtemp(path.join(os.tmpdir(), "taskloop-task-"));
    }

    private async selectResources(task: string, signal?: AbortSignal): Promise<ResourceSelection> {
        const limit = this.config.selector_limit;
        if (!this.config.use_resource_selector) {
            return new ResourceSelection(this.catalog.entries().slice(0, limit), "all");
        }
        return this.selector.select(task, this.catalog, limit, signal);
    }

    /**
     * Generate / execute / critique until a terminal state.
     */
    private async loop(ctx: RunContext): Promise<TaskResult> {
        const { state, selection, signal } = ctx;
        this.transition(state, "generate");

        while (!state.isTerminal) {
            throwIfCancelled(state, signal);

            // 1. Hard ceiling on Generate calls
            if (state.iteration >= this.config.max_iterations) {
                return this.abort(
                    state,
                    selection,
                    "iteration_limit",
                    `Reached the limit of ${this.config.max_iterations} iterations without a final answer.`,
                );
            }
            state.iteration++;

            // 2. One generate → parse → execute cycle
            const outcome = await this.turns.runTurn(assemblePrompt(selection, state.history), {
                workingDir: ctx.workingDir,
                timeoutMs: this.config.timeout_seconds * 1000,
                temperature: this.config.temperature,
                signal,
                onAction: () => this.transition(state, "execute"),
            });
            this.append(state, "assistant", outcome.raw);

            // 3. Malformed response: explain and retry, within budget
            if (outcome.kind === "parse_error") {
                state.parseFailures++;
                this.append(state, "observation", outcome.observation);
                if (state.parseFailures > this.config.max_parse_retries) {
                    return this.abort(
                        state,
                        selection,
                        "parse_exhausted",
                        `${state.parseFailures} consecutive malformed responses; last: ${outcome.error.message}`,
                    );
                }
                continue;
            }

            state.parseFailures = 0;
            state.lastResponse = outcome.response;
            if (outcome.response.reasoning) state.lastReasoning = outcome.response.reasoning;

            // 4. Action: record what happened and go again
            if (outcome.kind === "action") {
                if (outcome.execution) {
                    this.emit("execution:complete", { taskId: state.taskId, result: outcome.execution });
                }
                this.append(state, "observation", outcome.observation);
                this.transition(state, "generate");
                continue;
            }

            // 5. Final answer: optional critique before finishing
            const finalAnswer = outcome.response.finalAnswer;
            state.proposedAnswer = finalAnswer;

            if (!this.critic || state.critiqueRounds >= this.config.max_critique_rounds) {
                return this.finish(state, selection, finalAnswer);
            }

            this.transition(state, "critique");
            const verdict = await this.critic.evaluate(state.task, finalAnswer, state.history, signal);
            state.lastVerdict = verdict;
            this.emit("critique:verdict", {
                taskId: state.taskId,
                verdict,
                round: state.critiqueRounds + 1,
            });

            if (verdict.accepted) {
                return this.finish(state, selection, finalAnswer);
            }

            state.critiqueRounds++;
            this.append(
                state,
                "observation",
                `Critique of your proposed answer:\n${verdict.feedback}\nAddress the critique, then give an improved final answer.`,
            );
            this.transition(state, "generate");
        }

        throw new Error(`Task ${state.taskId} left the loop in state "${state.phase}"`);
    }

    private append(state: TaskState, role: TurnRole, content: string): void {
        const turn: Turn = { index: state.history.length, role, content };
        state.history.push(turn);
        this.emit("turn:appended", { taskId: state.taskId, turn });
    }

    private transition(state: TaskState, to: AgentState): void {
        const from = state.phase;
        state.phase = to;
        state.isTerminal = to === "done" || to === "aborted";
        this.emit("state:change", { taskId: state.taskId, from, to, iteration: state.iteration });
    }

    private finish(state: TaskState, selection: ResourceSelection, finalAnswer: string): TaskResult {
        this.transition(state, "done");
        return {
            status: "done",
            taskId: state.taskId,
            finalAnswer,
            transcript: [...state.history],
            iterations: state.iteration,
            selection: selection.toJSON(),
        };
    }

    private abort(
        state: TaskState,
        selection: ResourceSelection,
        reason: AbortReason,
        detail: string,
    ): TaskResult {
        this.transition(state, "aborted");
        const partialAnswer = state.proposedAnswer ?? state.lastReasoning;
        return {
            status: "aborted",
            taskId: state.taskId,
            reason,
            detail,
            ...(partialAnswer !== undefined ? { partialAnswer } : {}),
            incomplete: true,
            transcript: [...state.history],
            iterations: state.iteration,
            selection: selection.toJSON(),
        };
    }

    private complete(result: TaskResult): TaskResult {
        this.emit("task:complete", { taskId: result.taskId, result });
        return result;
    }
}

function createTaskState(taskId: string, task: string): TaskState {
    return {
        taskId,
        task,
        phase: "select",
        history: [],
        iteration: 0,
        parseFailures: 0,
        critiqueRounds: 0,
        isTerminal: false,
    };
}

function throwIfCancelled(state: TaskState, signal?: AbortSignal): void {
    if (signal?.aborted) throw new TaskCancelledError(state.taskId);
}
