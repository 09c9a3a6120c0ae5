/**
 * Catalog Schemas: capability entries the agent may be told about.
 * @see docs/architecture.md §2: Resource catalog
 */
import { z } from "zod/v4";

/** Display and ordering sequence of resource categories. */
export const RESOURCE_CATEGORIES = ["tool", "dataset", "library", "knowledge"] as const;

export const ResourceCategory = z.enum(RESOURCE_CATEGORIES);
export type ResourceCategory = z.infer<typeof ResourceCategory>;

export const ResourceLicense = z.enum(["open", "non_commercial"]);
export type ResourceLicense = z.infer<typeof ResourceLicense>;

/**
 * One capability: a tool signature, a dataset, an importable library or a
 * know-how document.
 */
export const ResourceEntry = z.object({
    name: z.string().min(1).describe("Unique capability name."),
    description: z.string().min(1).describe("Natural-language description shown to the model."),
    category: ResourceCategory,
    license: ResourceLicense.default("open"),
    /** Import path or module the capability lives in, if any. */
    module: z.string().optional(),
    metadata: z.record(z.string(), z.string()).optional(),
});
export type ResourceEntry = z.infer<typeof ResourceEntry>;

/** A catalog file holds either a bare array of entries or a `CatalogDocument`. */
export const CatalogEntries = z.array(ResourceEntry);

export const CatalogDocument = z.object({ resources: CatalogEntries });
