import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "fs/promises";
import os from "os";
import path from "path";
import { ResourceCatalog, ResourceSelection, licensedSubset, loadCatalog } from "../catalog.js";
import { CatalogLoadError } from "../../errors/index.js";

const entries = [
    { name: "blast", description: "Sequence similarity search", category: "tool" },
    { name: "omim", description: "Disease genes", category: "dataset", license: "non_commercial" },
    { name: "pandas", description: "Data frames", category: "library", module: "pandas" },
];

describe("ResourceCatalog", () => {
    it("keeps file order and looks entries up by name", () => {
        const catalog = ResourceCatalog.from(entries);

        expect(catalog.size).toBe(3);
        expect(catalog.entries().map((entry) => entry.name)).toEqual(["blast", "omim", "pandas"]);
        expect(catalog.get("pandas")?.module).toBe("pandas");
        expect(catalog.has("nothing")).toBe(false);
    });

    it("rejects duplicate names", () => {
        expect(() => ResourceCatalog.from([entries[0], entries[0]])).toThrow("Duplicate resource name: blast");
    });

    it("hands out frozen entries", () => {
        const catalog = ResourceCatalog.from(entries);
        expect(Object.isFrozen(catalog.get("blast"))).toBe(true);
    });
});

describe("licensedSubset()", () => {
    it("drops non-commercial entries in commercial mode only", () => {
        const catalog = ResourceCatalog.from(entries);

        expect(licensedSubset(catalog, false)).toBe(catalog);
        expect(licensedSubset(catalog, true).entries().map((entry) => entry.name)).toEqual(["blast", "pandas"]);
    });
});

describe("ResourceSelection", () => {
    it("serializes source, entries and note", () => {
        const catalog = ResourceCatalog.from(entries);
        const selection = new ResourceSelection([catalog.entries()[2]], "fallback", "selection call failed");

        expect(selection.names()).toEqual(["pandas"]);
        expect(selection.toJSON()).toEqual({
            source: "fallback",
            resources: [{ name: "pandas", description: "Data frames", category: "library", license: "open", module: "pandas" }],
            note: "selection call failed",
        });
    });
});

describe("loadCatalog()", () => {
    let dir: string;

    beforeEach(async () => {
        dir = await fs.mkdtemp(path.join(os.tmpdir(), "taskloop-catalog-test-"));
    });

    afterEach(async () => {
        await fs.rm(dir, { recursive: true, force: true });
    });

    it("loads a resources file", async () => {
        const file = path.join(dir, "catalog.json");
        await fs.writeFile(file, JSON.stringify({ resources: entries }));

        const catalog = await loadCatalog(file);

        expect(catalog.size).toBe(3);
    });

    it("wraps a missing file in CatalogLoadError", async () => {
        const failure = loadCatalog(path.join(dir, "missing.json"));

        await expect(failure).rejects.toBeInstanceOf(CatalogLoadError);
        await expect(failure).rejects.toThrow(/^Failed to load resource catalog from .*missing\.json: ENOENT/);
    });

    it("names the invalid field", async () => {
        const file = path.join(dir, "bad.json");
        await fs.writeFile(file, JSON.stringify([{ name: "x", description: "y", category: "gadget" }]));

        await expect(loadCatalog(file)).rejects.toThrow(/0\.category: /);
    });
});
