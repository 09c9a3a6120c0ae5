/**
 * ResourceCatalog: immutable, process-wide capability registry.
 *
 * Loaded once at start-up and shared read-only by every task. A
 * ResourceSelection is the per-task ranked subset the selector returns.
 *
 * @see docs/architecture.md §2: Resource catalog
 */
import fs from "fs/promises";
import { ZodError } from "zod/v4";
import { CatalogDocument, CatalogEntries, ResourceEntry } from "../schemas/catalog.js";
import type { ResourceEntry as ResourceEntryType } from "../schemas/catalog.js";
import type { SelectionSource, SelectionSummary } from "../schemas/transcript.js";
import { CatalogLoadError } from "../errors/index.js";

export class ResourceCatalog {
    private readonly byName: ReadonlyMap<string, Readonly<ResourceEntryType>>;
    private readonly ordered: readonly Readonly<ResourceEntryType>[];

    private constructor(entries: readonly ResourceEntryType[]) {
        const byName = new Map<string, Readonly<ResourceEntryType>>();
        for (const entry of entries) {
            if (byName.has(entry.name)) {
                throw new Error(`Duplicate resource name: ${entry.name}`);
            }
            byName.set(entry.name, Object.freeze({ ...entry }));
        }
        this.byName = byName;
        this.ordered = Object.freeze([...byName.values()]);
    }

    /** Validate raw entries and build a catalog. Throws on invalid or duplicate entries. */
    static from(entries: readonly unknown[]): ResourceCatalog {
        return new ResourceCatalog(entries.map((entry) => ResourceEntry.parse(entry)));
    }

    static empty(): ResourceCatalog {
        return new ResourceCatalog([]);
    }

    get size(): number {
        return this.ordered.length;
    }

    has(name: string): boolean {
        return this.byName.has(name);
    }

    get(name: string): Readonly<ResourceEntryType> | undefined {
        return this.byName.get(name);
    }

    /** Entries in catalog (file) order. */
    entries(): readonly Readonly<ResourceEntryType>[] {
        return this.ordered;
    }

    filter(predicate: (entry: Readonly<ResourceEntryType>) => boolean): ResourceCatalog {
        return new ResourceCatalog(this.ordered.filter(predicate));
    }
}

/**
 * Load a catalog from a JSON file holding an array of entries or
 * `{ "resources": [...] }`.
 */
export async function loadCatalog(filePath: string): Promise<ResourceCatalog> {
    let raw: string;
    try {
        raw = await fs.readFile(filePath, "utf-8");
    } catch (err) {
        throw new CatalogLoadError(filePath, err instanceof Error ? err.message : String(err), err);
    }

    try {
        const json: unknown = JSON.parse(raw);
        // Parse the branch directly so issues keep their field paths
        const entries = Array.isArray(json)
            ? CatalogEntries.parse(json)
            : CatalogDocument.parse(json).resources;
        return ResourceCatalog.from(entries);
    } catch (err) {
        const reason = err instanceof ZodError
            ? err.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ")
            : err instanceof Error ? err.message : String(err);
        throw new CatalogLoadError(filePath, reason, err);
    }
}

/** Drop non-commercially licensed entries when running in commercial mode. */
export function licensedSubset(catalog: ResourceCatalog, commercialMode: boolean): ResourceCatalog {
    if (!commercialMode) return catalog;
    return catalog.filter((entry) => entry.license !== "non_commercial");
}

/**
 * The task-specific subset of the catalog, most relevant first.
 * Owned by the single task run that produced it.
 */
export class ResourceSelection {
    public readonly entries: readonly Readonly<ResourceEntryType>[];
    public readonly source: SelectionSource;
    public readonly note?: string;

    constructor(
        entries: readonly Readonly<ResourceEntryType>[],
        source: SelectionSource,
        note?: string,
    ) {
        this.entries = Object.freeze([...entries]);
        this.source = source;
        this.note = note;
    }

    get size(): number {
        return this.entries.length;
    }

    names(): string[] {
        return this.entries.map((entry) => entry.name);
    }

    toJSON(): SelectionSummary {
        return {
            source: this.source,
            resources: this.entries.map((entry) => ({ ...entry })),
            ...(this.note !== undefined ? { note: this.note } : {}),
        };
    }
}
