/**
 * Resource Selector: picks the slice of the catalog shown to the model.
 *
 * One structured LLM call ranks catalog entries by relevance to the task.
 * Any failure other than cancellation degrades to a fixed fallback subset;
 * selection never fails a task.
 *
 * @see docs/architecture.md §2: Resource catalog
 */
import type { LLMClient } from "../llm/client.js";
import { ResourceSelection } from "../catalog/catalog.js";
import type { ResourceCatalog } from "../catalog/catalog.js";
import type { ResourceEntry } from "../schemas/catalog.js";
import { ResourceChoice } from "../schemas/verdicts.js";

export const DEFAULT_SELECTOR_PROMPT = `You choose which resources an autonomous coding assistant should see for a task.
Pick only the resources that are likely to help solve the task, most relevant first.
Return their names exactly as listed.`;

export interface SelectorOptions {
    systemPrompt?: string;
    /** Default: 0 */
    temperature?: number;
}

/** The first `limit` catalog entries, in catalog order. */
export function fallbackSelection(
    catalog: ResourceCatalog,
    limit: number,
    note: string,
): ResourceSelection {
    return new ResourceSelection(catalog.entries().slice(0, limit), "fallback", note);
}

export class ResourceSelector {
    private systemPrompt: string;
    private temperature: number;
    private llmClient: LLMClient;

    constructor(llmClient: LLMClient, options: SelectorOptions = {}) {
        this.llmClient = llmClient;
        this.systemPrompt = options.systemPrompt ?? DEFAULT_SELECTOR_PROMPT;
        this.temperature = options.temperature ?? 0;
    }

    async select(
        task: string,
        catalog: ResourceCatalog,
        limit: number,
        signal?: AbortSignal,
    ): Promise<ResourceSelection> {
        if (catalog.size === 0) {
            return new ResourceSelection([], "all", "catalog is empty");
        }

        let names: string[];
        try {
            const result = await this.llmClient.generateObject(
                ResourceChoice,
                this.systemPrompt,
                buildSelectionPrompt(task, catalog, limit),
                { temperature: this.temperature, signal },
            );
            names = result.object.resources;
        } catch (err) {
            if (signal?.aborted) throw err;
            const reason = err instanceof Error ? err.message : String(err);
            return fallbackSelection(catalog, limit, `selection call failed: ${reason}`);
        }

        const chosen: Readonly<ResourceEntry>[] = [];
        const seen = new Set<string>();
        let unknown = 0;

        for (const raw of names) {
            const name = raw.trim();
            if (seen.has(name)) continue;
            seen.add(name);
            const entry = catalog.get(name);
            if (!entry) {
                unknown++;
                continue;
            }
            chosen.push(entry);
        }

        if (chosen.length === 0) {
            const note = unknown > 0
                ? `model chose no catalog resources (${unknown} unknown name(s) dropped)`
                : "model chose no resources";
            return fallbackSelection(catalog, limit, note);
        }

        const note = unknown > 0 ? `${unknown} unknown name(s) dropped` : undefined;
        return new ResourceSelection(chosen.slice(0, limit), "model", note);
    }
}

function buildSelectionPrompt(task: string, catalog: ResourceCatalog, limit: number): string {
    const listing = catalog.entries()
        .map((entry) => `[${entry.category}] ${entry.name}: ${entry.description}`)
        .join("\n");

    return `Task:\n${task}\n\nChoose at most ${limit} resources from this list:\n${listing}`;
}
