/**
 * Runtime vocabulary: the fixed set of identifiers an action block may declare.
 * @see docs/architecture.md §3: Runtime tag vocabulary
 */

export const RUNTIME_IDS = ["python", "r", "bash"] as const;
export type RuntimeId = (typeof RUNTIME_IDS)[number];

/** Human-readable kind of each runtime, as shown to the model. */
export const RUNTIME_KINDS: Readonly<Record<RuntimeId, string>> = {
    python: "general-purpose",
    r: "statistical",
    bash: "shell",
};

/** How to launch a runtime: `command ...args <script file>`. */
export interface RuntimeCommand {
    command: string;
    args: string[];
    /** Script file extension, including the dot. */
    extension: string;
}

export const DEFAULT_RUNTIMES: Readonly<Record<RuntimeId, RuntimeCommand>> = {
    python: { command: "python3", args: [], extension: ".py" },
    r: { command: "Rscript", args: [], extension: ".R" },
    bash: { command: "bash", args: [], extension: ".sh" },
};

export function isRuntimeId(value: string): value is RuntimeId {
    return RUNTIME_IDS.some((id) => id === value);
}
