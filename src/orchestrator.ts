/**
 * Orchestrator: runs a batch of independent tasks through one TaskAgent.
 *
 * Tasks share only the read-only catalog and the clients held by the agent;
 * each run owns its TaskState and working directory.
 *
 * @see docs/architecture.md §1: Control loop
 */
import pLimit from "p-limit";
import type { TaskAgent } from "./core/agent.js";
import type { TaskResult } from "./schemas/transcript.js";

export interface BatchOptions {
    agent: TaskAgent;
    tasks: readonly string[];
    /** Maximum number of tasks running at once. Default: 4 */
    concurrency?: number;
    /** Cancels every task still running or queued. */
    signal?: AbortSignal;
    /** Callback for logging/monitoring each finished task. */
    onTaskComplete?: (index: number, result: TaskResult) => void;
}

/**
 * Run every task and return the results in input order.
 */
export async function runTaskBatch(options: BatchOptions): Promise<TaskResult[]> {
    const { agent, tasks, concurrency = 4, signal, onTaskComplete } = options;
    const limit = pLimit(concurrency);

    const runs = tasks.map((task, index) =>
        limit(async () => {
            const result = await agent.run(task, { signal });
            onTaskComplete?.(index, result);
            return result;
        }),
    );

    return Promise.all(runs);
}
