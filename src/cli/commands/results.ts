/**
 * `crewline results`: print the task results persisted for a workflow.
 */

import { Command } from "commander";
import pc from "picocolors";
import { SqlitePersistence } from "../../storage/sqlite-persistence.js";
import type { IStoredTaskResult } from "../../storage/sqlite-persistence.js";
import { loadConfig } from "../runtime.js";
import { preview } from "./run.js";

interface IResultsOptions {
  readonly json?: boolean | undefined;
  readonly projectRoot?: string | undefined;
}

/** One summary line per task, followed by its error or a result preview. */
export function formatTaskResults(rows: readonly IStoredTaskResult[]): string[] {
  const lines: string[] = [];
  for (const row of rows) {
    lines.push(`${row.key} ${row.state} attempt ${row.attempt} ${row.assignedAgent ?? "-"}`);
    if (row.error) {
      lines.push(`    ${row.error.kind}: ${row.error.detail}`);
    } else if (row.result !== undefined) {
      lines.push(`    ${preview(row.result)}`);
    }
  }
  return lines;
}

export function createResultsCommand(): Command {
  return new Command("results")
    .description("Print the persisted task results of a workflow")
    .argument("<workflowId>", "Workflow id printed by `crewline run`")
    .option("--json", "Print the stored rows as JSON")
    .option("--project-root <path>", "Override project root detection")
    .action((workflowId: string, options: IResultsOptions) => {
      const config = loadConfig(options.projectRoot);
      const store = new SqlitePersistence();
      store.open(config.persistence.databasePath);
      try {
        const rows = store.listTaskResults(workflowId);
        if (rows.length === 0) {
          process.stderr.write(pc.red(`No stored results for workflow ${workflowId}\n`));
          process.exitCode = 1;
          return;
        }
        if (options.json === true) {
          process.stdout.write(`${JSON.stringify(rows, null, 2)}\n`);
          return;
        }
        process.stdout.write(`${formatTaskResults(rows).join("\n")}\n`);
      } finally {
        store.close();
      }
    });
}
