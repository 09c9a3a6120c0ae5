import { defineConfig } from "vitest/config";

export default defineConfig({
    test: {
        include: ["src/**/*.test.ts"],
        environment: "node",
        // Harness tests spawn real subprocesses.
        testTimeout: 15_000,
    },
});
