import chalk from "chalk";
import ora from "ora";
import { InvalidArgumentError, type Command } from "commander";
import {
  AssetNotFoundError,
  LIFECYCLE_STATES,
  describeGateRule,
  isLifecycleState,
  type AssetRecord,
  type LifecycleState,
} from "@greenlight/core";
import { getContext } from "../lib/context.js";
import { exitWithError, formatAge, header, outcomeColor, stateColor } from "../lib/format.js";

function parseState(value: string): LifecycleState {
  if (!isLifecycleState(value)) {
    throw new InvalidArgumentError(`Expected one of: ${LIFECYCLE_STATES.join(", ")}.`);
  }
  return value;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function printAsset(asset: AssetRecord): void {
  const tasks = asset.taskIds.length > 0 ? chalk.dim(` [${asset.taskIds.join(", ")}]`) : "";
  console.log(`  ${chalk.bold(asset.id)} ${stateColor(asset.state)} ${asset.name}${tasks}`);
}

export function registerAsset(program: Command): void {
  const asset = program.command("asset").description("Asset lifecycle (create, list, move, check, history, link)");

  asset
    .command("create <name>")
    .description("Start tracking an asset in the idea state")
    .option("--id <id>", "Asset id as scope::path (defaults to the name as a scope, e.g. hero_sword::)")
    .option("-p, --path <path>", "Versioned file path, relative to the project root")
    .option("-t, --type <type>", "Asset type, e.g. prop or character")
    .option("--task <id>", "Link an existing task (repeatable)", collect, [])
    .action(async (name: string, opts: { id?: string; path?: string; type?: string; task: string[] }) => {
      const { lifecycle } = await getContext();
      try {
        const created = await lifecycle.createAsset({
          name,
          id: opts.id,
          path: opts.path,
          assetType: opts.type,
          taskIds: opts.task,
        });
        console.log(chalk.green(`Created ${chalk.bold(created.id)} (${created.path})`));
      } catch (err) {
        exitWithError(err);
      }
    });

  asset
    .command("list")
    .description("List assets")
    .option("-s, --state <state>", "Only assets in this state", parseState)
    .option("--json", "Output as JSON")
    .action(async (opts: { state?: LifecycleState; json?: boolean }) => {
      const { lifecycle } = await getContext();
      const assets = lifecycle.listAssets(opts.state);

      if (opts.json) {
        console.log(JSON.stringify(assets, null, 2));
        return;
      }
      if (assets.length === 0) {
        console.log(chalk.dim(opts.state ? `No assets in ${opts.state}.` : "No assets yet."));
        return;
      }
      for (const record of assets) printAsset(record);
    });

  asset
    .command("move")
    .description("Move an asset to another lifecycle state")
    .argument("<id>", "Asset id")
    .argument("<state>", "Target state", parseState)
    .option("-m, --message <text>", "Description recorded with the file submit")
    .action(async (id: string, target: LifecycleState, opts: { message?: string }) => {
      const { lifecycle } = await getContext();
      const spinner = ora(`Moving ${id} to ${target}`).start();
      try {
        const result = await lifecycle.transition(id, target, { description: opts.message });
        const { entry } = result;
        spinner.succeed(`${chalk.bold(id)}: ${stateColor(entry.from)} → ${stateColor(entry.to)}`);
        if (entry.plugins.length > 0) console.log(chalk.dim(`  via ${entry.plugins.join(", ")}`));
        for (const { plugin, error } of result.notificationErrors) {
          console.log(chalk.yellow(`  ! ${plugin} notification failed: ${error.message}`));
        }
      } catch (err) {
        spinner.fail(`Could not move ${id} to ${target}`);
        exitWithError(err);
      }
    });

  asset
    .command("check")
    .description("Evaluate the gate for a move without performing it")
    .argument("<id>", "Asset id")
    .argument("<state>", "Target state", parseState)
    .action(async (id: string, target: LifecycleState) => {
      const { lifecycle } = await getContext();
      try {
        const check = await lifecycle.checkTransition(id, target);
        const rule = chalk.dim(describeGateRule(check.rule));
        if (check.satisfied) {
          console.log(chalk.green(`✓ ${check.transition}`) + ` ${rule}`);
          return;
        }
        console.log(chalk.yellow(`✗ ${check.transition}`) + ` ${rule}`);
        console.log(`  ${check.reason ?? "gate not satisfied"}`);
      } catch (err) {
        exitWithError(err);
      }
      process.exit(1);
    });

  asset
    .command("history <id>")
    .description("Show an asset's transition history")
    .option("--json", "Output as JSON")
    .action(async (id: string, opts: { json?: boolean }) => {
      const { lifecycle } = await getContext();
      const record = lifecycle.getAsset(id) ?? exitWithError(new AssetNotFoundError(id));

      if (opts.json) {
        console.log(JSON.stringify(record.history, null, 2));
        return;
      }

      console.log(header(`${record.name} (${record.id})`));
      console.log(`  ${chalk.dim("State:")} ${stateColor(record.state)}`);
      console.log(`  ${chalk.dim("Path:")}  ${record.path}`);
      if (record.taskIds.length > 0) console.log(`  ${chalk.dim("Tasks:")} ${record.taskIds.join(", ")}`);
      console.log();

      if (record.history.length === 0) {
        console.log(chalk.dim("  (no transitions yet)"));
        return;
      }
      for (const entry of record.history) {
        const plugins = entry.plugins.length > 0 ? chalk.dim(` via ${entry.plugins.join(", ")}`) : "";
        console.log(
          `  ${chalk.dim(entry.timestamp.toISOString())} ${entry.from} → ${entry.to} ${outcomeColor(entry.outcome)} ${entry.actor}${plugins} ${chalk.dim(`(${formatAge(entry.timestamp)})`)}`,
        );
        if (entry.reason) console.log(`     ${entry.reason}`);
      }
    });

  asset
    .command("link <id> <task>")
    .description("Link an existing task to an asset")
    .action(async (id: string, task: string) => {
      const { lifecycle } = await getContext();
      try {
        const record = await lifecycle.linkTask(id, task);
        console.log(chalk.green(`Linked ${task} to ${record.id}`));
      } catch (err) {
        exitWithError(err);
      }
    });
}
