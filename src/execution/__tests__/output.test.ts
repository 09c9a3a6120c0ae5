import { describe, it, expect } from "vitest";
import { BoundedOutput } from "../output.js";

describe("BoundedOutput", () => {
    it("keeps everything under the cap", () => {
        const output = new BoundedOutput(16);
        output.push(Buffer.from("hello "));
        output.push(Buffer.from("world"));

        expect(output.truncated).toBe(false);
        expect(output.toString()).toBe("hello world");
    });

    it("drops bytes past the cap and marks the text", () => {
        const output = new BoundedOutput(5);
        output.push(Buffer.from("abc"));
        output.push(Buffer.from("defgh"));
        output.push(Buffer.from("ij"));

        expect(output.truncated).toBe(true);
        expect(output.droppedBytes).toBe(5);
        expect(output.toString()).toBe("abcde\n...[truncated 5 bytes]");
    });

    it("cuts at a character boundary", () => {
        const output = new BoundedOutput(5);
        output.push(Buffer.from("ééé"));

        expect(output.droppedBytes).toBe(2);
        expect(output.toString()).toBe("éé\n...[truncated 2 bytes]");
    });

    it("drops everything after the first cut", () => {
        const output = new BoundedOutput(5);
        output.push(Buffer.from("abcdé"));
        output.push(Buffer.from("z"));

        expect(output.toString()).toBe("abcd\n...[truncated 3 bytes]");
    });
});
