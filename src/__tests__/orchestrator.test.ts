import { describe, it, expect, vi } from "vitest";
import fs from "fs/promises";
import os from "os";
import path from "path";
import { runTaskBatch } from "../orchestrator.js";
import { TaskAgent } from "../core/agent.js";
import { ResourceCatalog } from "../catalog/catalog.js";
import type { CodeExecutor, ExecutionRequest } from "../execution/harness.js";
import type { AgentConfigInput } from "../schemas/config.js";
import { LLMClient } from "../llm/client.js";
import { conversationModel, exitedResult, scriptedClient, testConfig } from "./helpers.js";

function echoAgent(harness: CodeExecutor, config: AgentConfigInput = {}): TaskAgent {
    return new TaskAgent({
        config: testConfig(config),
        llm: new LLMClient(conversationModel([`<execute runtime="bash">echo hi</execute>`, "<solution>ok</solution>"])),
        catalog: ResourceCatalog.empty(),
        harness,
    });
}

describe("runTaskBatch()", () => {
    it("returns results in input order", async () => {
        const agent = new TaskAgent({
            config: testConfig(),
            llm: scriptedClient(["<solution>ok</solution>"]),
            catalog: ResourceCatalog.empty(),
        });

        const results = await runTaskBatch({ agent, tasks: ["one", "two", "three"], concurrency: 2 });

        expect(results.map((result) => result.transcript[0].content)).toEqual(["one", "two", "three"]);
        expect(results.every((result) => result.status === "done")).toBe(true);
    });

    it("never runs more tasks at once than the concurrency limit", async () => {
        let running = 0;
        let peak = 0;
        const harness: CodeExecutor = {
            execute: vi.fn(async () => {
                running++;
                peak = Math.max(peak, running);
                await new Promise((resolve) => setTimeout(resolve, 50));
                running--;
                return exitedResult({ stdout: "hi\n" });
            }),
        };

        await runTaskBatch({ agent: echoAgent(harness), tasks: ["a", "b", "c", "d", "e"], concurrency: 2 });

        expect(peak).toBeGreaterThan(0);
        expect(peak).toBeLessThanOrEqual(2);
        expect(harness.execute).toHaveBeenCalledTimes(5);
    });

    it("reports each finished task", async () => {
        const agent = new TaskAgent({
            config: testConfig(),
            llm: scriptedClient(["<solution>ok</solution>"]),
            catalog: ResourceCatalog.empty(),
        });
        const finished: number[] = [];

        await runTaskBatch({ agent, tasks: ["a", "b"], onTaskComplete: (index) => finished.push(index) });

        expect([...finished].sort()).toEqual([0, 1]);
    });

    it("cancels queued tasks once the signal fires", async () => {
        const controller = new AbortController();
        controller.abort();
        const agent = new TaskAgent({
            config: testConfig(),
            llm: scriptedClient(["<solution>ok</solution>"]),
            catalog: ResourceCatalog.empty(),
        });

        const results = await runTaskBatch({ agent, tasks: ["a", "b"], signal: controller.signal });

        expect(results.map((result) => result.status === "aborted" && result.reason)).toEqual(["cancelled", "cancelled"]);
    });

    it("gives concurrent tasks their own directory under working_dir", async () => {
        const root = await fs.mkdtemp(path.join(os.tmpdir(), "taskloop-batch-test-"));
        const dirs: string[] = [];
        const harness: CodeExecutor = {
            execute: vi.fn(async (request: ExecutionRequest) => {
                dirs.push(request.workingDir ?? "");
                return exitedResult({ stdout: "hi\n" });
            }),
        };

        const results = await runTaskBatch({
            agent: echoAgent(harness, { working_dir: root }),
            tasks: ["a", "b"],
            concurrency: 2,
        });

        expect(new Set(dirs).size).toBe(2);
        expect([...dirs].sort()).toEqual(results.map((result) => path.join(root, result.taskId)).sort());
        await fs.rm(root, { recursive: true, force: true });
    });

    it("keeps the other results when one task fails unexpectedly", async () => {
        let calls = 0;
        const harness: CodeExecutor = {
            execute: vi.fn(async () => {
                calls++;
                if (calls === 2) throw new Error("EACCES: permission denied, open script");
                return exitedResult({ stdout: "hi\n" });
            }),
        };

        const results = await runTaskBatch({ agent: echoAgent(harness), tasks: ["a", "b", "c"], concurrency: 1 });

        expect(results.map((result) => result.status)).toEqual(["done", "aborted", "done"]);
        expect(results[1]).toMatchObject({
            reason: "internal_error",
            detail: "EACCES: permission denied, open script",
        });
    });
});
