/**
 * Prompt Assembler: builds the model payload for one turn.
 *
 * Pure and deterministic: resources are ordered by category then name no
 * matter how the selector ranked them, so identical inputs always produce a
 * byte-identical payload.
 *
 * @see docs/architecture.md §4: Prompt assembly
 */
import { RESOURCE_CATEGORIES } from "../schemas/catalog.js";
import type { ResourceCategory, ResourceEntry } from "../schemas/catalog.js";
import type { Turn } from "../schemas/transcript.js";
import type { ResourceSelection } from "../catalog/catalog.js";
import type { ChatMessage } from "../llm/client.js";
import { RUNTIME_IDS, RUNTIME_KINDS } from "../execution/runtimes.js";

export interface PromptPayload {
    system: string;
    messages: ChatMessage[];
}

const CATEGORY_TITLES: Readonly<Record<ResourceCategory, string>> = {
    tool: "Tools",
    dataset: "Datasets",
    library: "Libraries",
    knowledge: "Know-how",
};

const RUNTIME_LINES = RUNTIME_IDS.map((id) => `- ${id}: ${RUNTIME_KINDS[id]}`).join("\n");

export const BASE_INSTRUCTIONS = `You are an autonomous assistant that solves tasks by reasoning, writing code and running it.

Every response follows this format:
1. Optionally think step by step inside <think>...</think>.
2. Then EITHER run code with one <execute runtime="ID">...</execute> block,
   OR give the final answer inside <solution>...</solution>. Never both in one response.

Available runtimes (the ID goes in the runtime attribute):
${RUNTIME_LINES}

Rules:
- Only the first <execute> block of a response is run.
- Results of your code come back inside <observation>...</observation>. Read them before deciding the next step.
- Files written by earlier steps stay available in the working directory for the whole task.
- Give the final answer only once the task is complete; do not guess results you have not observed.`;

function compareEntries(a: ResourceEntry, b: ResourceEntry): number {
    const byCategory = RESOURCE_CATEGORIES.indexOf(a.category) - RESOURCE_CATEGORIES.indexOf(b.category);
    if (byCategory !== 0) return byCategory;
    if (a.name === b.name) return 0;
    return a.name < b.name ? -1 : 1;
}

function formatEntry(entry: ResourceEntry): string {
    const location = entry.module ? ` (${entry.module})` : "";
    return `- ${entry.name}${location}: ${entry.description}`;
}

function buildSystemPrompt(selection: ResourceSelection): string {
    const sorted = [...selection.entries].sort(compareEntries);
    const sections: string[] = [BASE_INSTRUCTIONS];

    for (const category of RESOURCE_CATEGORIES) {
        const entries = sorted.filter((entry) => entry.category === category);
        if (entries.length === 0) continue;
        sections.push(`## ${CATEGORY_TITLES[category]}\n${entries.map(formatEntry).join("\n")}`);
    }

    return sections.join("\n\n");
}

function toMessage(turn: Turn): ChatMessage {
    switch (turn.role) {
        case "user":
            return { role: "user", content: turn.content };
        case "assistant":
            return { role: "assistant", content: turn.content };
        case "observation":
            return { role: "user", content: `<observation>\n${turn.content}\n</observation>` };
        case "system":
            return { role: "user", content: `[system] ${turn.content}` };
    }
}

/**
 * Build the system message and conversation for the next Generate call.
 */
export function assemblePrompt(
    selection: ResourceSelection,
    history: readonly Turn[],
): PromptPayload {
    return {
        system: buildSystemPrompt(selection),
        messages: history.map(toMessage),
    };
}
