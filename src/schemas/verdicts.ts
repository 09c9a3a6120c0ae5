/**
 * Verdict Schemas: structured outputs of the auxiliary LLM calls.
 */
import { z } from "zod/v4";

/**
 * The resource selector's answer: chosen catalog names, most relevant first.
 */
export const ResourceChoice = z.object({
    resources: z
        .array(z.string())
        .describe("Names of the catalog entries needed for the task, most relevant first."),
});
export type ResourceChoice = z.infer<typeof ResourceChoice>;

/**
 * The critic's evaluation of a proposed final answer.
 */
export const CritiqueVerdict = z.object({
    accepted: z.boolean().describe("True if the answer fully and correctly resolves the task."),
    feedback: z.string().describe("Concrete problems to fix, or a short confirmation when accepted."),
});
export type CritiqueVerdict = z.infer<typeof CritiqueVerdict>;
