import * as p from "@clack/prompts";
import chalk from "chalk";
import ora from "ora";
import fs from "fs/promises";
import path from "path";
import { z } from "zod/v4";
import { runTaskBatch } from "../../index.js";
import { archiveResults, createAgent, interruptSignal, parseIntegerOption, summarize } from "./shared.js";
import type { AgentCommandOptions } from "./shared.js";

export interface BatchCommandOptions extends AgentCommandOptions {
    concurrency?: string;
}

/** A batch file is a JSON array of task strings. */
export const BatchFile = z.array(z.string().trim().min(1)).min(1);

async function readBatchFile(filePath: string): Promise<string[]> {
    const resolved = path.resolve(process.cwd(), filePath);
    const raw = await fs.readFile(resolved, "utf-8");
    const parsed = BatchFile.safeParse(JSON.parse(raw));
    if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
        throw new Error(`Invalid batch file ${resolved}: ${issues}`);
    }
    return parsed.data;
}

function shorten(text: string, max = 60): string {
    const line = text.replace(/\s+/g, " ");
    return line.length > max ? `${line.slice(0, max - 3)}...` : line;
}

/** `taskloop batch <file>`: run independent tasks concurrently. */
export async function batchCommand(file: string, options: BatchCommandOptions) {
    const json = options.json === true;
    if (!json) p.intro(chalk.bgCyan.black(" taskloop - Batch "));

    try {
        const tasks = await readBatchFile(file);
        const concurrency = parseIntegerOption(options.concurrency, "--concurrency") ?? 4;
        const { agent } = await createAgent(options);

        if (!json) p.log.info(`Running ${tasks.length} task(s), ${concurrency} at a time.`);

        let finished = 0;
        const spinner = ora({ text: `0/${tasks.length} finished`, isSilent: json }).start();

        const results = await runTaskBatch({
            agent,
            tasks,
            concurrency,
            signal: interruptSignal(),
            onTaskComplete: () => {
                finished++;
                spinner.text = `${finished}/${tasks.length} finished`;
            },
        });

        archiveResults(options.db, results.map((result, index) => ({ task: tasks[index], result })));

        const aborted = results.filter((result) => result.status === "aborted").length;
        if (json) {
            console.log(JSON.stringify(results, null, 2));
        } else {
            spinner.stop();
            results.forEach((result, index) => {
                const line = `${chalk.bold(shorten(tasks[index]))}\n${summarize(result)}`;
                if (result.status === "done") p.log.success(line);
                else p.log.warn(line);
            });
            p.outro(`${results.length - aborted} done, ${aborted} aborted.`);
        }

        process.exitCode = aborted === 0 ? 0 : 2;
    } catch (err) {
        p.log.error(chalk.red(err instanceof Error ? err.message : String(err)));
        process.exit(1);
    }
}
