/**
 * Agent Configuration: All tunable parameters in one place.
 * @see docs/architecture.md §6: Configuration
 */
import { z } from "zod/v4";

/** Largest timeout whose milliseconds fit a 32-bit signed setTimeout delay. */
export const MAX_TIMEOUT_SECONDS = 2_147_483;

/**
 * The single configuration object controlling the agent loop.
 * Callers pass this to `TaskAgent`; nothing in the core reads process state.
 */
export const AgentConfig = z.object({
    // --- Execution ---
    /** Wall-clock timeout for a single code execution. Capped to what setTimeout can hold. */
    timeout_seconds: z.number().int().positive().max(MAX_TIMEOUT_SECONDS).default(600),
    /** Per-stream capture cap for child process output. */
    max_output_bytes: z.number().int().positive().default(10_000),
    /** Persistent directory shared by all tasks. Absent: one scratch dir per task. */
    working_dir: z.string().min(1).optional(),

    // --- Loop Limits ---
    /** Hard ceiling on Generate calls per task (global circuit breaker). */
    max_iterations: z.number().int().positive().default(200),
    /** Consecutive malformed responses tolerated before aborting. */
    max_parse_retries: z.number().int().nonnegative().default(3),

    // --- Critique ---
    critique_enabled: z.boolean().default(false),
    /** Rejections after which the next final answer is accepted unreviewed. */
    max_critique_rounds: z.number().int().positive().default(3),

    // --- Resource Selection ---
    use_resource_selector: z.boolean().default(true),
    selector_limit: z.number().int().positive().default(25),
    /** Excludes non-commercially licensed catalog entries. */
    commercial_mode: z.boolean().default(false),

    // --- LLM ---
    provider: z.string().min(1).optional(),
    model: z.string().min(1).optional(),
    /** OpenAI-compatible server for self-hosted models; implies the `custom` provider. */
    base_url: z.url().optional(),
    /** Key for `base_url` only. Hosted providers read their own key variables. */
    api_key: z.string().min(1).optional(),
    /** Region for the `bedrock` provider. */
    aws_region: z.string().min(1).optional(),
    temperature: z.number().min(0).max(2).default(0.7),
    critic_temperature: z.number().min(0).max(2).default(0.3),
    selector_temperature: z.number().min(0).max(2).default(0),
    /** Transient-error retries performed inside the LLM client. */
    llm_max_retries: z.number().int().nonnegative().default(5),
    llm_timeout_seconds: z.number().int().positive().max(MAX_TIMEOUT_SECONDS).default(300),
});
export type AgentConfig = z.infer<typeof AgentConfig>;
export type AgentConfigInput = z.input<typeof AgentConfig>;

const EnvConfig = z.object({
    TASKLOOP_TIMEOUT_SECONDS: z.coerce.number().int().positive().max(MAX_TIMEOUT_SECONDS).optional(),
    TASKLOOP_MAX_ITERATIONS: z.coerce.number().int().positive().optional(),
    TASKLOOP_CRITIQUE: z.stringbool().optional(),
    TASKLOOP_USE_RESOURCE_SELECTOR: z.stringbool().optional(),
    TASKLOOP_SELECTOR_LIMIT: z.coerce.number().int().positive().optional(),
    TASKLOOP_COMMERCIAL_MODE: z.stringbool().optional(),
    TASKLOOP_TEMPERATURE: z.coerce.number().min(0).max(2).optional(),
    TASKLOOP_LLM_MAX_RETRIES: z.coerce.number().int().nonnegative().optional(),
    TASKLOOP_WORKING_DIR: z.string().min(1).optional(),
    TASKLOOP_PROVIDER: z.string().min(1).optional(),
    TASKLOOP_MODEL: z.string().min(1).optional(),
    TASKLOOP_BASE_URL: z.url().optional(),
    TASKLOOP_API_KEY: z.string().min(1).optional(),
    AWS_REGION: z.string().min(1).optional(),
    AWS_DEFAULT_REGION: z.string().min(1).optional(),
});

function definedEntries(input: object): Record<string, unknown> {
    const out: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(input)) {
        if (value !== undefined) out[key] = value;
    }
    return out;
}

/**
 * Read `TASKLOOP_*` overrides, and the standard AWS region variables, from an environment map.
 * Empty variables are ignored; malformed ones throw a ZodError naming the variable.
 * Keys whose variable is unset come back as `undefined`.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<AgentConfigInput> {
    const present: Record<string, string> = {};
    for (const key of Object.keys(EnvConfig.shape)) {
        const value = env[key]?.trim();
        if (value) present[key] = value;
    }
    const parsed = EnvConfig.parse(present);

    return {
        timeout_seconds: parsed.TASKLOOP_TIMEOUT_SECONDS,
        max_iterations: parsed.TASKLOOP_MAX_ITERATIONS,
        critique_enabled: parsed.TASKLOOP_CRITIQUE,
        use_resource_selector: parsed.TASKLOOP_USE_RESOURCE_SELECTOR,
        selector_limit: parsed.TASKLOOP_SELECTOR_LIMIT,
        commercial_mode: parsed.TASKLOOP_COMMERCIAL_MODE,
        temperature: parsed.TASKLOOP_TEMPERATURE,
        llm_max_retries: parsed.TASKLOOP_LLM_MAX_RETRIES,
        working_dir: parsed.TASKLOOP_WORKING_DIR,
        provider: parsed.TASKLOOP_PROVIDER,
        model: parsed.TASKLOOP_MODEL,
        base_url: parsed.TASKLOOP_BASE_URL,
        api_key: parsed.TASKLOOP_API_KEY,
        aws_region: parsed.AWS_REGION ?? parsed.AWS_DEFAULT_REGION,
    };
}

/**
 * Merge defaults < environment < explicit overrides and validate the result.
 * Overrides set to `undefined` (e.g. absent CLI flags) do not mask the environment.
 */
export function resolveConfig(
    overrides: Partial<AgentConfigInput> = {},
    env: NodeJS.ProcessEnv = process.env,
): AgentConfig {
    return AgentConfig.parse({
        ...definedEntries(configFromEnv(env)),
        ...definedEntries(overrides),
    });
}
