/**
 * Transcript Schemas: the externally observable artifact of a run.
 * Every TaskResult is plain JSON; TranscriptRecord validates one read back from storage.
 * @see docs/architecture.md §5: Transcript output
 */
import { z } from "zod/v4";
import { ResourceEntry } from "./catalog.js";

export const TurnRole = z.enum(["user", "assistant", "observation", "system"]);
export type TurnRole = z.infer<typeof TurnRole>;

/** One append-only message in the running conversation. */
export const Turn = z.object({
    index: z.number().int().nonnegative(),
    role: TurnRole,
    content: z.string(),
});
export type Turn = z.infer<typeof Turn>;

export const AbortReason = z.enum([
    "iteration_limit",
    "provider_fatal",
    "parse_exhausted",
    "cancelled",
    "internal_error",
]);
export type AbortReason = z.infer<typeof AbortReason>;

export const SelectionSource = z.enum(["model", "fallback", "all"]);
export type SelectionSource = z.infer<typeof SelectionSource>;

/** Serialized form of a ResourceSelection. */
export const SelectionSummary = z.object({
    source: SelectionSource,
    resources: z.array(ResourceEntry),
    note: z.string().optional(),
});
export type SelectionSummary = z.infer<typeof SelectionSummary>;

const ResultBase = {
    taskId: z.string(),
    transcript: z.array(Turn),
    iterations: z.number().int().nonnegative(),
    selection: SelectionSummary,
};

export const DoneResult = z.object({
    status: z.literal("done"),
    finalAnswer: z.string().min(1),
    ...ResultBase,
});
export type DoneResult = z.infer<typeof DoneResult>;

export const AbortedResult = z.object({
    status: z.literal("aborted"),
    reason: AbortReason,
    detail: z.string(),
    partialAnswer: z.string().optional(),
    incomplete: z.literal(true),
    ...ResultBase,
});
export type AbortedResult = z.infer<typeof AbortedResult>;

/** Outcome of one task run: `Done` with a final answer, or `Aborted` with a reason code. */
export const TranscriptRecord = z.discriminatedUnion("status", [DoneResult, AbortedResult]);
export type TaskResult = z.infer<typeof TranscriptRecord>;
