/**
 * Response grammar: parses an assistant turn into a StructuredResponse.
 *
 * Three named blocks are recognised:
 *   <think>…</think>                  optional reasoning
 *   <execute runtime="ID">…</execute> an action (code to run)
 *   <solution>…</solution>            the final answer
 *
 * A well-formed response carries exactly one of action / final answer. Anything
 * else is a ResponseParseError; free text is never promoted to an answer.
 *
 * @see docs/architecture.md §4: Structured response grammar
 */
import { ResponseParseError } from "../errors/index.js";
import { RUNTIME_IDS, isRuntimeId } from "../execution/runtimes.js";
import type { RuntimeId } from "../execution/runtimes.js";

export interface ActionBlock {
    runtime: RuntimeId;
    source: string;
}

export type StructuredResponse =
    | {
        kind: "action";
        reasoning?: string;
        action: ActionBlock;
        /** Further action blocks in the same response; never executed. */
        ignoredActions: number;
    }
    | {
        kind: "final_answer";
        reasoning?: string;
        finalAnswer: string;
    };

const THINK_BLOCK = /<think>([\s\S]*?)<\/think>/i;
const EXECUTE_OPEN = /<execute\b[^>]*>/gi;
const EXECUTE_BLOCK = /<execute\b([^>]*)>([\s\S]*?)<\/execute>/gi;
const SOLUTION_OPEN = /<solution>/gi;
const SOLUTION_BLOCK = /<solution>([\s\S]*?)<\/solution>/gi;
const RUNTIME_ATTR = /\bruntime\s*=\s*(?:"([^"]*)"|'([^']*)'|([^\s"'>]+))/i;
const WHOLE_FENCE = /^```[\w+-]*[^\S\n]*\n([\s\S]*?)\n?```$/;

const RUNTIME_LIST = RUNTIME_IDS.join(", ");

function count(pattern: RegExp, text: string): number {
    return [...text.matchAll(pattern)].length;
}

/** Drop leading blank lines and trailing whitespace, keeping first-line indentation. */
function trimBlock(text: string): string {
    return text.replace(/^\s*\n/, "").replace(/\s+$/, "");
}

function stripFence(source: string): string {
    const trimmed = source.trim();
    const fenced = WHOLE_FENCE.exec(trimmed);
    return fenced ? trimBlock(fenced[1]) : trimBlock(source);
}

function parseRuntime(attributes: string): RuntimeId {
    const match = RUNTIME_ATTR.exec(attributes);
    if (!match) {
        throw new ResponseParseError(
            "missing_runtime",
            `The <execute> block has no runtime attribute. Declare one of: ${RUNTIME_LIST}, e.g. <execute runtime="python">.`,
        );
    }
    const declared = (match[1] ?? match[2] ?? match[3]).trim().toLowerCase();
    if (!isRuntimeId(declared)) {
        throw new ResponseParseError(
            "unknown_runtime",
            `Unknown runtime "${declared}". Supported runtimes: ${RUNTIME_LIST}.`,
        );
    }
    return declared;
}

/**
 * Parse raw model text. Throws ResponseParseError for every grammar violation.
 */
export function parseResponse(raw: string): StructuredResponse {
    const actions = [...raw.matchAll(EXECUTE_BLOCK)];
    const solutions = [...raw.matchAll(SOLUTION_BLOCK)];

    if (count(EXECUTE_OPEN, raw) > actions.length) {
        throw new ResponseParseError(
            "unterminated_block",
            "An <execute> block was opened but not closed with </execute>.",
        );
    }
    if (count(SOLUTION_OPEN, raw) > solutions.length) {
        throw new ResponseParseError(
            "unterminated_block",
            "A <solution> block was opened but not closed with </solution>.",
        );
    }
    if (actions.length > 0 && solutions.length > 0) {
        throw new ResponseParseError(
            "conflicting_blocks",
            "The response contains both an <execute> block and a <solution> block. Provide exactly one: run code, or give the final answer.",
        );
    }
    if (actions.length === 0 && solutions.length === 0) {
        throw new ResponseParseError(
            "missing_block",
            "The response contains neither an <execute> block nor a <solution> block. Run code with <execute runtime=\"...\">, or give the final answer inside <solution></solution>.",
        );
    }

    const thought = THINK_BLOCK.exec(raw)?.[1].trim();
    const reasoning = thought ? thought : undefined;

    if (actions.length > 0) {
        const [, attributes, body] = actions[0];
        const runtime = parseRuntime(attributes);
        const source = stripFence(body);
        if (!source.trim()) {
            throw new ResponseParseError("empty_action", "The <execute> block contains no code.");
        }
        return {
            kind: "action",
            reasoning,
            action: { runtime, source },
            ignoredActions: actions.length - 1,
        };
    }

    const finalAnswer = solutions[0][1].trim();
    if (!finalAnswer) {
        throw new ResponseParseError("empty_answer", "The <solution> block is empty.");
    }
    return { kind: "final_answer", reasoning, finalAnswer };
}
