import { describe, it, expect } from "vitest";
import { assemblePrompt, BASE_INSTRUCTIONS } from "../prompt.js";
import { ResourceCatalog, ResourceSelection } from "../../catalog/catalog.js";
import type { Turn } from "../../schemas/transcript.js";

const catalog = ResourceCatalog.from([
    { name: "zeta", description: "Last tool", category: "tool" },
    { name: "alpha", description: "A library", category: "library", module: "alpha.core" },
    { name: "Beta", description: "Capitalised tool", category: "tool" },
    { name: "gamma", description: "A dataset", category: "dataset" },
]);

const history: Turn[] = [
    { index: 0, role: "user", content: "Count the rows" },
    { index: 1, role: "assistant", content: `<execute runtime="bash">wc -l data.csv</execute>` },
    { index: 2, role: "observation", content: "exit_code: 0\nstdout:\n12 data.csv" },
    { index: 3, role: "system", content: "Time is running out." },
];

describe("assemblePrompt()", () => {
    it("lists resources by category, then by name in code-point order", () => {
        const selection = new ResourceSelection(catalog.entries(), "model");

        const { system } = assemblePrompt(selection, history);

        expect(system).toBe(
            `${BASE_INSTRUCTIONS}\n\n`
            + "## Tools\n- Beta: Capitalised tool\n- zeta: Last tool\n\n"
            + "## Datasets\n- gamma: A dataset\n\n"
            + "## Libraries\n- alpha (alpha.core): A library",
        );
    });

    it("is independent of the selection's ranking order", () => {
        const ranked = new ResourceSelection(catalog.entries(), "model");
        const reversed = new ResourceSelection([...catalog.entries()].reverse(), "model");

        expect(assemblePrompt(reversed, history)).toEqual(assemblePrompt(ranked, history));
    });

    it("produces byte-identical output for identical inputs", () => {
        const selection = new ResourceSelection(catalog.entries(), "fallback");

        const first = JSON.stringify(assemblePrompt(selection, history));
        const second = JSON.stringify(assemblePrompt(selection, history));

        expect(second).toBe(first);
    });

    it("maps transcript turns onto chat messages", () => {
        const { messages } = assemblePrompt(new ResourceSelection([], "all"), history);

        expect(messages).toEqual([
            { role: "user", content: "Count the rows" },
            { role: "assistant", content: `<execute runtime="bash">wc -l data.csv</execute>` },
            { role: "user", content: "<observation>\nexit_code: 0\nstdout:\n12 data.csv\n</observation>" },
            { role: "user", content: "[system] Time is running out." },
        ]);
    });

    it("describes the runtime vocabulary and omits empty resource sections", () => {
        const { system } = assemblePrompt(new ResourceSelection([], "all"), history);

        expect(system).toBe(BASE_INSTRUCTIONS);
        expect(system).toContain("- python: general-purpose\n- r: statistical\n- bash: shell");
    });
});
