import * as p from "@clack/prompts";
import chalk from "chalk";
import fs from "fs";
import path from "path";
import { TranscriptStore } from "../../index.js";
import type { TaskResult } from "../../index.js";
import { parseIntegerOption } from "./shared.js";

export interface TranscriptCommandOptions {
    db: string;
    status?: string;
    limit?: string;
    json?: boolean;
}

function openStore(dbPath: string): TranscriptStore {
    const resolved = path.resolve(process.cwd(), dbPath);
    if (!fs.existsSync(resolved)) {
        throw new Error(`No transcript database at ${resolved}. Pass --db when running tasks to create one.`);
    }
    return new TranscriptStore(resolved);
}

function parseStatus(value: string | undefined): TaskResult["status"] | undefined {
    if (value === undefined) return undefined;
    if (value === "done" || value === "aborted") return value;
    throw new Error(`Invalid --status value: ${value} (expected done or aborted)`);
}

/** `taskloop transcripts list`: newest archived runs first. */
export async function listTranscriptsCommand(options: TranscriptCommandOptions) {
    try {
        const store = openStore(options.db);
        try {
            const rows = store.list({
                status: parseStatus(options.status),
                limit: parseIntegerOption(options.limit, "--limit"),
            });
            if (options.json) {
                console.log(JSON.stringify(rows, null, 2));
                return;
            }
            if (rows.length === 0) {
                p.log.info("No transcripts archived yet.");
                return;
            }
            for (const row of rows) {
                const status = row.status === "done" ? chalk.green("done") : chalk.yellow(`aborted/${row.reason}`);
                p.log.message(`${chalk.cyan(row.id)}  ${chalk.dim(row.createdAt)}  ${status}  ${row.iterations} it.\n${row.task}`);
            }
        } finally {
            store.close();
        }
    } catch (err) {
        p.log.error(chalk.red(err instanceof Error ? err.message : String(err)));
        process.exit(1);
    }
}

/** `taskloop transcripts show <id>`: print one archived transcript. */
export async function showTranscriptCommand(taskId: string, options: TranscriptCommandOptions) {
    try {
        const store = openStore(options.db);
        try {
            const result = store.get(taskId);
            if (!result) throw new Error(`No transcript with id ${taskId}.`);

            if (options.json) {
                console.log(JSON.stringify(result, null, 2));
                return;
            }

            p.intro(chalk.bgCyan.black(` Transcript ${result.taskId} `));
            for (const turn of result.transcript) {
                p.log.message(`${chalk.bold(`#${turn.index} ${turn.role}`)}\n${turn.content}`);
            }
            p.outro(
                result.status === "done"
                    ? chalk.green(`Done after ${result.iterations} iteration(s).`)
                    : chalk.yellow(`Aborted (${result.reason}): ${result.detail}`),
            );
        } finally {
            store.close();
        }
    } catch (err) {
        p.log.error(chalk.red(err instanceof Error ? err.message : String(err)));
        process.exit(1);
    }
}
