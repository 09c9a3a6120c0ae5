/**
 * ExecutionHarness: runs one code snippet in an isolated child process.
 *
 * Each invocation writes the snippet to its own script file, spawns the
 * runtime in a fresh process group, caps captured output and enforces a
 * wall-clock timeout by killing the whole group. Failures of the executed code
 * are data (non-zero exit, stderr); only an interpreter that cannot be started
 * rejects.
 *
 * @see docs/architecture.md §3: Execution harness
 */
import { spawn } from "child_process";
import fs from "fs/promises";
import os from "os";
import path from "path";
import { v4 as uuidv4 } from "uuid";
import { RuntimeLaunchError } from "../errors/index.js";
import { BoundedOutput } from "./output.js";
import { DEFAULT_RUNTIMES } from "./runtimes.js";
import type { RuntimeCommand, RuntimeId } from "./runtimes.js";

export interface ExecutionRequest {
    runtime: RuntimeId;
    source: string;
    timeoutMs: number;
    /** Persistent directory to run in. Absent: a scratch directory is created and removed. */
    workingDir?: string;
    signal?: AbortSignal;
}

/** How the child process ended. */
export type Termination = "exited" | "timeout" | "cancelled" | "signaled";

export interface ExecutionResult {
    runtime: RuntimeId;
    stdout: string;
    stderr: string;
    /** Process exit code; `128 + signal number` when killed by a signal; null if never started. */
    exitCode: number | null;
    signal: string | null;
    termination: Termination;
    timedOut: boolean;
    /** True when the process died from a signal rather than exiting on its own. */
    killed: boolean;
    durationMs: number;
    truncated: boolean;
}

export interface HarnessOptions {
    /** Per-stream capture cap in bytes. Default: 10000 */
    maxOutputBytes?: number;
    /** Replace the launch command of individual runtimes. */
    runtimes?: Partial<Record<RuntimeId, RuntimeCommand>>;
    /** Environment for child processes. Default: inherit. */
    env?: NodeJS.ProcessEnv;
}

/** Anything that can run a snippet the way the harness does. */
export interface CodeExecutor {
    execute(request: ExecutionRequest): Promise<ExecutionResult>;
}

const SIGNAL_NUMBERS = new Map<string, number>(Object.entries(os.constants.signals));

function signalExitCode(signal: string): number {
    return 128 + (SIGNAL_NUMBERS.get(signal) ?? 0);
}

function toErrnoException(err: unknown): NodeJS.ErrnoException {
    return err instanceof Error ? err : new Error(String(err));
}

export class ExecutionHarness implements CodeExecutor {
    private readonly maxOutputBytes: number;
    private readonly runtimes: Record<RuntimeId, RuntimeCommand>;
    private readonly env?: NodeJS.ProcessEnv;

    constructor(options: HarnessOptions = {}) {
        this.maxOutputBytes = options.maxOutputBytes ?? 10_000;
        this.runtimes = { ...DEFAULT_RUNTIMES, ...options.runtimes };
        this.env = options.env;
    }

    /**
     * Execute a snippet and report what happened.
     * Rejects only with `RuntimeLaunchError`.
     */
    async execute(request: ExecutionRequest): Promise<ExecutionResult> {
        const runtime = this.runtimes[request.runtime];
        const { cwd, scriptPath, scratchDir } = await this.prepareScript(request, runtime);

        try {
            return await this.spawnScript(request, runtime, scriptPath, cwd);
        } finally {
            await fs.rm(scriptPath, { force: true });
            if (scratchDir) await fs.rm(scratchDir, { recursive: true, force: true });
        }
    }

    /** Write the snippet to its own script file, in a scratch directory if none was given. */
    private async prepareScript(
        request: ExecutionRequest,
        runtime: RuntimeCommand,
    ): Promise<{ cwd: string; scriptPath: string; scratchDir?: string }> {
        let scratchDir: string | undefined;
        try {
            const cwd = request.workingDir
                ?? (scratchDir = await fs.mkdtemp(path.join(os.tmpdir(), "taskloop-exec-")));
            const scriptPath = path.join(cwd, `.taskloop-${uuidv4()}${runtime.extension}`);
            await fs.writeFile(scriptPath, request.source, "utf-8");
            return { cwd, scriptPath, scratchDir };
        } catch (err) {
            if (scratchDir) await fs.rm(scratchDir, { recursive: true, force: true });
            throw new RuntimeLaunchError(request.runtime, runtime.command, toErrnoException(err), "setup");
        }
    }

    private spawnScript(
        request: ExecutionRequest,
        runtime: RuntimeCommand,
        scriptPath: string,
        cwd: string,
    ): Promise<ExecutionResult> {
        const startTime = Date.now();

        if (request.signal?.aborted) {
            return Promise.resolve({
                runtime: request.runtime,
                stdout: "",
                stderr: "",
                exitCode: null,
                signal: null,
                termination: "cancelled",
                timedOut: false,
                killed: false,
                durationMs: 0,
                truncated: false,
            });
        }

        return new Promise((resolve, reject) => {
            const stdout = new BoundedOutput(this.maxOutputBytes);
            const stderr = new BoundedOutput(this.maxOutputBytes);
            let stopReason: "timeout" | "cancelled" | undefined;
            let settled = false;

            // Own process group, so the timeout can take down grandchildren too
            const child = spawn(runtime.command, [...runtime.args, scriptPath], {
                cwd,
                env: this.env,
                detached: true,
                stdio: ["ignore", "pipe", "pipe"],
            });

            const killGroup = (reason: "timeout" | "cancelled"): void => {
                if (settled || stopReason) return;
                stopReason = reason;
                if (child.pid === undefined) return;
                try {
                    process.kill(-child.pid, "SIGKILL");
                } catch (err) {
                    // ESRCH: the group is already gone
                    if (err instanceof Error && "code" in err && err.code === "ESRCH") return;
                    child.kill("SIGKILL");
                }
            };

            const timer = setTimeout(() => killGroup("timeout"), request.timeoutMs);
            const onAbort = (): void => killGroup("cancelled");
            request.signal?.addEventListener("abort", onAbort, { once: true });

            const finish = (): void => {
                settled = true;
                clearTimeout(timer);
                request.signal?.removeEventListener("abort", onAbort);
            };

            child.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
            child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));

            child.on("error", (err: NodeJS.ErrnoException) => {
                if (settled) return;
                if (child.pid === undefined) {
                    finish();
                    reject(new RuntimeLaunchError(request.runtime, runtime.command, err));
                    return;
                }
                stderr.push(Buffer.from(`\n[harness] ${err.message}\n`));
            });

            child.on("close", (code, signal) => {
                if (settled) return;
                finish();

                let termination: Termination = "exited";
                if (stopReason) termination = stopReason;
                else if (signal) termination = "signaled";

                resolve({
                    runtime: request.runtime,
                    stdout: stdout.toString(),
                    stderr: stderr.toString(),
                    exitCode: signal ? signalExitCode(signal) : code,
                    signal,
                    termination,
                    timedOut: termination === "timeout",
                    killed: signal !== null,
                    durationMs: Date.now() - startTime,
                    truncated: stdout.truncated || stderr.truncated,
                });
            });
        });
    }
}
