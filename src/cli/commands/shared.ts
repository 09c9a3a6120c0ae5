/**
 * Pieces shared by the agent-running commands: option parsing, API key
 * checks, agent construction and progress rendering.
 */
import * as p from "@clack/prompts";
import chalk from "chalk";
import type { Ora } from "ora";
import path from "path";
import {
    LLMClient,
    PROVIDER_KEY_VARS,
    ResourceCatalog,
    TaskAgent,
    TranscriptStore,
    loadCatalog,
    providerName,
    resolveConfig,
    resolveLanguageModel,
} from "../../index.js";
import type { AgentConfig, TaskResult } from "../../index.js";

/** Options accepted by every command that runs tasks. */
export interface AgentCommandOptions {
    catalog?: string;
    maxIterations?: string;
    timeout?: string;
    critique?: boolean;
    /** False when `--no-selector` is given. */
    selector?: boolean;
    workingDir?: string;
    provider?: string;
    model?: string;
    baseUrl?: string;
    db?: string;
    json?: boolean;
}

export function parseIntegerOption(value: string | undefined, flag: string): number | undefined {
    if (value === undefined) return undefined;
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed <= 0) {
        throw new Error(`Invalid ${flag} value: ${value}`);
    }
    return parsed;
}

export function ensureApiKeyPresent(provider: string | undefined, baseUrl?: string): void {
    const name = providerName(provider, baseUrl);
    const keyVars = PROVIDER_KEY_VARS[name];
    if (keyVars && !keyVars.some((keyVar) => process.env[keyVar])) {
        throw new Error(`No API key detected for ${name}. Set ${keyVars.join(" or ")}.`);
    }
}

export async function createAgent(
    options: AgentCommandOptions,
): Promise<{ agent: TaskAgent; config: AgentConfig; catalog: ResourceCatalog }> {
    const config = resolveConfig({
        max_iterations: parseIntegerOption(options.maxIterations, "--max-iterations"),
        timeout_seconds: parseIntegerOption(options.timeout, "--timeout"),
        critique_enabled: options.critique ? true : undefined,
        use_resource_selector: options.selector === false ? false : undefined,
        working_dir: options.workingDir ? path.resolve(options.workingDir) : undefined,
        provider: options.provider,
        model: options.model,
        base_url: options.baseUrl,
    });

    ensureApiKeyPresent(config.provider, config.base_url);

    const catalog = options.catalog
        ? await loadCatalog(path.resolve(process.cwd(), options.catalog))
        : ResourceCatalog.empty();

    const model = resolveLanguageModel(config.provider, config.model, {
        baseUrl: config.base_url,
        apiKey: config.api_key,
        awsRegion: config.aws_region,
    });
    const llm = new LLMClient(model, {
        maxRetries: config.llm_max_retries,
        timeoutMs: config.llm_timeout_seconds * 1000,
    });

    return { agent: new TaskAgent({ config, llm, catalog }), config, catalog };
}

/**
 * Abort the returned signal on Ctrl-C so running tasks end as `cancelled`
 * instead of dying mid-execution.
 */
export function interruptSignal(): AbortSignal {
    const controller = new AbortController();
    process.once("SIGINT", () => controller.abort());
    return controller.signal;
}

/** Print a clack log line without tearing the spinner. */
function logAbove(spinner: Ora, write: () => void): void {
    spinner.clear();
    write();
    spinner.render();
}

/**
 * Render agent events: spinner text for state changes, log lines for
 * selection, executions and critique verdicts.
 */
export function attachProgress(agent: TaskAgent, spinner: Ora, label?: (taskId: string) => string): void {
    const prefix = (taskId: string) => (label ? `${chalk.dim(label(taskId))} ` : "");

    agent.on("selection:complete", ({ taskId, selection }) => {
        const note = selection.note ? chalk.dim(` (${selection.note})`) : "";
        logAbove(spinner, () =>
            p.log.info(`${prefix(taskId)}Using ${selection.size} resource(s), source: ${selection.source}${note}`),
        );
    });

    agent.on("state:change", ({ taskId, to, iteration }) => {
        spinner.text = `${prefix(taskId)}Iteration ${iteration}: ${to}`;
    });

    agent.on("execution:complete", ({ taskId, result }) => {
        const status = result.timedOut
            ? chalk.red("timed out")
            : result.exitCode === 0
                ? chalk.green("exit 0")
                : chalk.yellow(`exit ${result.exitCode ?? "none"}`);
        logAbove(spinner, () =>
            p.log.step(`${prefix(taskId)}${chalk.cyan(result.runtime)} ran in ${result.durationMs}ms, ${status}`),
        );
    });

    agent.on("critique:verdict", ({ taskId, verdict, round }) => {
        const text = verdict.accepted
            ? chalk.green(`Critique round ${round}: accepted`)
            : chalk.yellow(`Critique round ${round}: rejected. ${verdict.feedback}`);
        logAbove(spinner, () => p.log.message(`${prefix(taskId)}${text}`));
    });
}

/** Archive results when `--db` was given. */
export function archiveResults(dbPath: string | undefined, runs: ReadonlyArray<{ task: string; result: TaskResult }>): void {
    if (!dbPath) return;
    const store = new TranscriptStore(path.resolve(process.cwd(), dbPath));
    try {
        for (const { task, result } of runs) store.save(result, task);
    } finally {
        store.close();
    }
}

export function summarize(result: TaskResult): string {
    if (result.status === "done") return result.finalAnswer;
    return `aborted (${result.reason}): ${result.detail}`;
}
