/**
 * Error Class Tests: Validate custom error classes.
 */
import { describe, it, expect } from "vitest";
import {
    ProviderError,
    ResponseParseError,
    RuntimeLaunchError,
    CatalogLoadError,
    TaskCancelledError,
    StructuredOutputError,
} from "../../errors/index.js";

describe("ProviderError", () => {
    it("carries kind, status and retryability", () => {
        const err = new ProviderError("auth", "invalid key", { statusCode: 401 });
        expect(err).toBeInstanceOf(Error);
        expect(err.name).toBe("ProviderError");
        expect(err.kind).toBe("auth");
        expect(err.statusCode).toBe(401);
        expect(err.retryable).toBe(false);
        expect(err.message).toBe("Provider error (auth): invalid key");
    });

    it("keeps the underlying cause", () => {
        const cause = new Error("socket hang up");
        const err = new ProviderError("transient", "network", { retryable: true, cause });
        expect(err.cause).toBe(cause);
        expect(err.retryable).toBe(true);
    });
});

describe("ResponseParseError", () => {
    it("exposes the grammar violation code", () => {
        const err = new ResponseParseError("unknown_runtime", "Unknown runtime \"julia\".");
        expect(err.code).toBe("unknown_runtime");
        expect(err.message).toContain("julia");
    });
});

describe("RuntimeLaunchError", () => {
    it("names the runtime, command and errno code", () => {
        const cause = Object.assign(new Error("spawn Rscript ENOENT"), { code: "ENOENT" });
        const err = new RuntimeLaunchError("r", "Rscript", cause);
        expect(err.runtime).toBe("r");
        expect(err.command).toBe("Rscript");
        expect(err.code).toBe("ENOENT");
        expect(err.message).toBe('Cannot launch runtime "r" (Rscript): spawn Rscript ENOENT');
        expect(err.stage).toBe("spawn");
    });

    it("describes a script that could not be written", () => {
        const cause = Object.assign(new Error("EACCES: permission denied"), { code: "EACCES" });
        const err = new RuntimeLaunchError("python", "python3", cause, "setup");
        expect(err.stage).toBe("setup");
        expect(err.code).toBe("EACCES");
        expect(err.message).toBe('Cannot prepare a "python" script: EACCES: permission denied');
    });
});

describe("CatalogLoadError", () => {
    it("contains the source path", () => {
        const err = new CatalogLoadError("catalogs/missing.json", "file not found");
        expect(err.source).toBe("catalogs/missing.json");
        expect(err.message).toContain("file not found");
    });
});

describe("TaskCancelledError", () => {
    it("tracks the task id", () => {
        const err = new TaskCancelledError("task-1");
        expect(err.taskId).toBe("task-1");
        expect(err.name).toBe("TaskCancelledError");
    });
});

describe("StructuredOutputError", () => {
    it("keeps the raw model text", () => {
        const err = new StructuredOutputError("expected boolean", "{\"accepted\":\"maybe\"}");
        expect(err.text).toBe("{\"accepted\":\"maybe\"}");
        expect(err.message).toBe("Model output failed validation: expected boolean");
    });
});
