import * as p from "@clack/prompts";
import chalk from "chalk";
import ora from "ora";
import { providerName } from "../../index.js";
import { archiveResults, attachProgress, createAgent, interruptSignal } from "./shared.js";
import type { AgentCommandOptions } from "./shared.js";

/** `taskloop run <task>`: drive one task to an answer. */
export async function runCommand(task: string, options: AgentCommandOptions) {
    const json = options.json === true;
    if (!json) p.intro(chalk.bgMagenta.black(" taskloop - Run Task "));

    try {
        const { agent, config, catalog } = await createAgent(options);

        if (!json) {
            p.log.info(`Provider: ${chalk.cyan(providerName(config.provider, config.base_url))}${config.model ? ` / ${chalk.cyan(config.model)}` : ""}`);
            p.log.info(`Catalog: ${catalog.size} resource(s), iteration ceiling ${config.max_iterations}, timeout ${config.timeout_seconds}s`);
        }

        const spinner = ora({ text: "Starting task...", isSilent: json }).start();
        if (!json) attachProgress(agent, spinner);

        const result = await agent.run(task, { signal: interruptSignal() });
        archiveResults(options.db, [{ task, result }]);

        if (json) {
            console.log(JSON.stringify(result, null, 2));
        } else if (result.status === "done") {
            spinner.succeed(chalk.green(`Finished in ${result.iterations} iteration(s).`));
            p.note(result.finalAnswer, "Final answer");
            p.outro(options.db ? `Transcript ${chalk.cyan(result.taskId)} saved.` : "Task complete.");
        } else {
            spinner.fail(chalk.yellow(`Aborted (${result.reason}) after ${result.iterations} iteration(s).`));
            p.log.warn(result.detail);
            if (result.partialAnswer) p.note(result.partialAnswer, "Partial answer");
            p.outro("Task did not reach a final answer.");
        }

        process.exitCode = result.status === "done" ? 0 : 2;
    } catch (err) {
        p.log.error(chalk.red(err instanceof Error ? err.message : String(err)));
        process.exit(1);
    }
}
