import { existsSync } from "node:fs";
import { join, resolve } from "node:path";
import chalk from "chalk";
import type { Command } from "commander";
import { CONFIG_DIR_NAME, PROJECT_CONFIG_FILE, type PluginRef } from "@greenlight/core";
import { getResolver } from "../lib/context.js";
import { exitWithError } from "../lib/format.js";

/** Plugins a new project starts with: the local depot and task file */
export const DEFAULT_PROJECT_PLUGINS: readonly PluginRef[] = [{ name: "local-files" }, { name: "local-tasks" }];

export function registerInit(program: Command): void {
  program
    .command("init")
    .description("Create a project and make it current")
    .option("-r, --root <dir>", "Project root directory", ".")
    .option("-n, --name <name>", "Project name (defaults to the directory name)")
    .option("-k, --key <key>", "Short project code, e.g. FEN")
    .action(async (opts: { root: string; name?: string; key?: string }) => {
      const root = resolve(opts.root);
      const file = join(root, CONFIG_DIR_NAME, PROJECT_CONFIG_FILE);
      const resolver = getResolver();

      try {
        if (existsSync(file)) {
          const project = resolver.openProject(root);
          await resolver.save("user");
          console.log(chalk.yellow(`Project already exists: ${file}`));
          console.log(`Opened ${chalk.bold(project.name)}`);
          return;
        }

        resolver.openProject(root);
        resolver.update("project", (draft) => {
          if (opts.name) draft.name = opts.name;
          if (opts.key) draft.key = opts.key;
          draft.plugins = DEFAULT_PROJECT_PLUGINS.map((ref) => ({ ...ref }));
          draft.active = { fileManager: "local-files", taskManager: "local-tasks" };
        });
        await resolver.save("project");

        // Re-open so the user layer records the project under its final name
        const project = resolver.openProject(root);
        await resolver.save("user");

        console.log(chalk.green(`Created project ${chalk.bold(project.name)} at ${root}`));
        console.log(chalk.dim(`Config written to ${file}`));
      } catch (err) {
        exitWithError(err);
      }
    });
}
