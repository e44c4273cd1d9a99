/**
 * `crewline templates`: list the workflow templates.
 */

import { Command } from "commander";
import pc from "picocolors";
import { loadTemplates } from "../../core/workflow-templates.js";

export function createTemplatesCommand(): Command {
  return new Command("templates")
    .description("List workflow templates")
    .option("--file <path>", "Read templates from another catalogue")
    .action(async (options: { file?: string | undefined }) => {
      const templates = await loadTemplates(options.file);
      for (const template of templates.values()) {
        const steps = template.tasks.map((task) => task.id).join(" -> ");
        process.stdout.write(`${pc.bold(template.name)}  ${template.description}\n`);
        process.stdout.write(`  ${pc.dim(`${template.mode}: ${steps}`)}\n`);
        if (template.requires.length > 0) {
          process.stdout.write(`  ${pc.dim(`context: ${template.requires.join(", ")}`)}\n`);
        }
      }
    });
}
