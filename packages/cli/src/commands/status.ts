import chalk from "chalk";
import type { Command } from "commander";
import { CAPABILITIES, LIFECYCLE_STATES, type Capability, type LifecycleState } from "@greenlight/core";
import { getContext } from "../lib/context.js";
import { banner, header, stateColor } from "../lib/format.js";

interface StatusInfo {
  project: { name: string; rootDir: string } | null;
  active: Array<{ capability: Capability; plugin: string | null }>;
  failedPlugins: string[];
  assets: Array<{ state: LifecycleState; count: number }>;
  diagnostics: string[];
}

export function registerStatus(program: Command): void {
  program
    .command("status")
    .description("Show the current project, active plugins and asset counts")
    .option("--json", "Output as JSON")
    .action(async (opts: { json?: boolean }) => {
      const { resolver, registry, lifecycle } = await getContext();

      const info: StatusInfo = {
        project: resolver.getEffectiveConfig().project,
        active: CAPABILITIES.map((capability) => ({
          capability,
          plugin: registry.getActive(capability)?.key ?? null,
        })),
        failedPlugins: registry.list().filter((d) => d.state === "failed").map((d) => d.key),
        assets: LIFECYCLE_STATES.map((state) => ({ state, count: lifecycle.listAssets(state).length })),
        diagnostics: resolver.diagnostics().map((d) => d.message),
      };

      if (opts.json) {
        console.log(JSON.stringify(info, null, 2));
        return;
      }

      console.log(banner("GREENLIGHT STATUS"));
      console.log();
      if (info.project) {
        console.log(`  ${chalk.dim("Project:")} ${chalk.bold(info.project.name)} ${chalk.dim(info.project.rootDir)}`);
      } else {
        console.log(chalk.yellow("  No current project. Run `greenlight init` to create one."));
      }
      console.log();

      console.log(header("Plugins"));
      for (const { capability, plugin } of info.active) {
        console.log(`  ${capability.padEnd(14)} ${plugin ? chalk.green(plugin) : chalk.dim("none")}`);
      }
      if (info.failedPlugins.length > 0) {
        console.log(chalk.red(`  ${info.failedPlugins.length} failed to load: ${info.failedPlugins.join(", ")}`));
        console.log(chalk.dim("  Run `greenlight plugins` for details."));
      }
      console.log();

      console.log(header("Assets"));
      let total = 0;
      for (const { state, count } of info.assets) {
        total += count;
        console.log(`  ${stateColor(state)}${" ".repeat(18 - state.length)}${count}`);
      }
      console.log(chalk.dim(`\n  ${total} asset${total !== 1 ? "s" : ""}`));

      for (const message of info.diagnostics) console.log(chalk.yellow(`\n  ! ${message}`));
      console.log();
    });
}
