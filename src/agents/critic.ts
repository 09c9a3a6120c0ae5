/**
 * Critic: reviews a proposed final answer before the task is allowed to end.
 *
 * The critic holds no memory across tasks. It sees the task, the proposed
 * answer and the raw transcript, and returns an accept/reject verdict with
 * feedback the agent feeds back to the model on rejection.
 *
 * @see docs/architecture.md §5: Critique cycle
 */
import type { LLMClient } from "../llm/client.js";
import type { Turn } from "../schemas/transcript.js";
import { CritiqueVerdict } from "../schemas/verdicts.js";
import type { CritiqueVerdict as CritiqueVerdictType } from "../schemas/verdicts.js";
import { StructuredOutputError } from "../errors/index.js";

export const DEFAULT_CRITIC_PROMPT = `You review the work of an autonomous assistant that solves tasks by running code.
You receive the task, the transcript of the assistant's work and its proposed final answer.
Accept the answer if it fully addresses the task and is supported by the observations in the transcript.
Otherwise reject it and explain, concretely, what is missing or wrong and what the assistant should do next.`;

export interface CriticOptions {
    systemPrompt?: string;
    /** Default: 0.3 */
    temperature?: number;
}

export class Critic {
    private systemPrompt: string;
    private temperature: number;
    private llmClient: LLMClient;

    constructor(llmClient: LLMClient, options: CriticOptions = {}) {
        this.llmClient = llmClient;
        this.systemPrompt = options.systemPrompt ?? DEFAULT_CRITIC_PROMPT;
        this.temperature = options.temperature ?? 0.3;
    }

    /**
     * Judge a proposed final answer.
     *
     * Output that fails the verdict schema counts as acceptance, so a broken
     * critic cannot hold a task hostage. Provider failures propagate.
     */
    async evaluate(
        task: string,
        finalAnswer: string,
        history: readonly Turn[],
        signal?: AbortSignal,
    ): Promise<CritiqueVerdictType> {
        const prompt = JSON.stringify({
            task,
            transcript: history.map((turn) => ({ role: turn.role, content: turn.content })),
            proposed_answer: finalAnswer,
        });

        try {
            const result = await this.llmClient.generateObject(
                CritiqueVerdict,
                this.systemPrompt,
                prompt,
                { temperature: this.temperature, signal },
            );
            return result.object;
        } catch (err) {
            if (!(err instanceof StructuredOutputError)) throw err;
            return {
                accepted: true,
                feedback: `Critic produced no usable verdict (${err.message}); answer accepted without review.`,
            };
        }
    }
}
