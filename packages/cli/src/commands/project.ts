import { resolve } from "node:path";
import chalk from "chalk";
import type { Command } from "commander";
import { getResolver } from "../lib/context.js";
import { exitWithError } from "../lib/format.js";

export function registerProject(program: Command): void {
  const project = program.command("project").description("Known projects (list, open)");

  project
    .command("list")
    .description("List the projects this user has opened")
    .option("--json", "Output as JSON")
    .action((opts: { json?: boolean }) => {
      const resolver = getResolver();
      const known = resolver.listProjects();
      const current = resolver.currentProject()?.name ?? null;

      if (opts.json) {
        console.log(JSON.stringify({ current, projects: known }, null, 2));
        return;
      }

      const names = Object.keys(known).sort();
      if (names.length === 0) {
        console.log(chalk.dim("No projects yet. Run `greenlight init` to create one."));
        return;
      }
      for (const name of names) {
        const marker = name === current ? chalk.green("*") : " ";
        console.log(`${marker} ${chalk.bold(name)} ${chalk.dim(known[name])}`);
      }
    });

  project
    .command("open <project>")
    .description("Make a project current, by name or root directory")
    .action(async (target: string) => {
      const resolver = getResolver();
      const root = resolver.listProjects()[target] ?? resolve(target);
      try {
        const opened = resolver.openProject(root);
        await resolver.save("user");
        console.log(chalk.green(`Opened ${chalk.bold(opened.name)} at ${root}`));
      } catch (err) {
        exitWithError(err);
      }
    });
}
