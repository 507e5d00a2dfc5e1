import chalk from "chalk";
import ora from "ora";
import { InvalidArgumentError, type Command } from "commander";
import { CAPABILITIES, isCapability, type Capability, type PluginDescriptor } from "@greenlight/core";
import { getContext } from "../lib/context.js";
import { header, pluginStateColor } from "../lib/format.js";

function parseCapability(value: string): Capability {
  if (!isCapability(value)) {
    throw new InvalidArgumentError(`Expected one of: ${CAPABILITIES.join(", ")}.`);
  }
  return value;
}

interface PluginInfo {
  name: string;
  version: string;
  description: string;
  capabilities: Capability[];
  source: string;
  state: PluginDescriptor["state"];
  active: boolean;
  failureReason: string | null;
}

export function registerPlugins(program: Command): void {
  program
    .command("plugins")
    .description("Discover plugins and show their load state")
    .option("-c, --capability <capability>", "Only plugins providing this capability", parseCapability)
    .option("--json", "Output as JSON")
    .action(async (opts: { capability?: Capability; json?: boolean }) => {
      const spinner = opts.json ? null : ora("Discovering plugins").start();
      const { registry, discovery } = await getContext();
      spinner?.stop();

      const descriptors = opts.capability ? registry.getByCapability(opts.capability) : registry.list();
      const infos: PluginInfo[] = descriptors.map((d) => ({
        name: d.manifest.name,
        version: d.manifest.version,
        description: d.manifest.description,
        capabilities: [...d.manifest.capabilities],
        source: d.source,
        state: d.state,
        active: registry.isActive(d),
        failureReason: d.failureReason,
      }));

      if (opts.json) {
        console.log(JSON.stringify({ plugins: infos, failures: discovery.failures }, null, 2));
        return;
      }

      console.log(header(opts.capability ? `Plugins: ${opts.capability}` : "Plugins"));
      if (infos.length === 0) console.log(chalk.dim("  (none found)"));
      for (const info of infos) {
        const inactive = info.active ? "" : chalk.dim(" inactive");
        console.log(
          `  ${chalk.bold(`${info.name}@${info.version}`)} ${pluginStateColor(info.state)}${inactive} ${chalk.dim(`${info.capabilities.join(", ")} · ${info.source}`)}`,
        );
        if (info.failureReason) console.log(chalk.red(`     ${info.failureReason}`));
      }

      if (discovery.failures.length > 0) {
        console.log(chalk.yellow(`\n  ${discovery.failures.length} candidate(s) could not be registered:`));
        for (const failure of discovery.failures) {
          console.log(chalk.yellow(`  ! ${failure.path}: ${failure.reason}`));
        }
      }
    });
}
