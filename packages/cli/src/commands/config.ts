import chalk from "chalk";
import { InvalidArgumentError, Option, type Command } from "commander";
import { parse as yamlParse } from "yaml";
import {
  CONFIG_SCOPES,
  NOT_CONFIGURED,
  SettingValueSchema,
  TRANSITION_KEYS,
  describeGateRule,
  isConfigScope,
  type ConfigResolver,
  type ConfigScope,
  type SettingValue,
} from "@greenlight/core";
import { getResolver } from "../lib/context.js";
import { exitWithError, formatValue, header } from "../lib/format.js";

function parseScope(value: string): ConfigScope {
  if (!isConfigScope(value)) {
    throw new InvalidArgumentError(`Expected one of: ${CONFIG_SCOPES.join(", ")}.`);
  }
  return value;
}

/**
 * Values are read as YAML scalars and collections ("24", "true", "[exr, png]"),
 * falling back to the literal text.
 */
export function parseSettingValue(raw: string): SettingValue {
  if (raw.trim() === "") return raw;
  let parsed: unknown;
  try {
    parsed = yamlParse(raw);
  } catch {
    return raw;
  }
  const result = SettingValueSchema.safeParse(parsed);
  return result.success ? result.data : raw;
}

function scopeOption(): Option {
  return new Option("-s, --scope <scope>", `Config layer: ${CONFIG_SCOPES.join(", ")}`).argParser(parseScope);
}

/** The most specific layer that defines a key */
function sourceOf(resolver: ConfigResolver, key: string): ConfigScope | null {
  for (const scope of ["project", "user", "site"] as const) {
    if (resolver.get(scope, key) !== NOT_CONFIGURED) return scope;
  }
  return null;
}

function showConfig(resolver: ConfigResolver): void {
  const effective = resolver.getEffectiveConfig();

  console.log(header("Configuration"));
  console.log(
    effective.project
      ? `  ${chalk.dim("Project:")} ${chalk.bold(effective.project.name)} ${chalk.dim(effective.project.rootDir)}`
      : `  ${chalk.dim("Project:")} ${chalk.dim("none")}`,
  );

  console.log(chalk.bold("\n  Settings"));
  const keys = Object.keys(effective.settings).sort();
  if (keys.length === 0) console.log(chalk.dim("    (none)"));
  for (const key of keys) {
    const source = sourceOf(resolver, key);
    console.log(`    ${key} = ${formatValue(effective.settings[key])} ${chalk.dim(`(${source ?? "?"})`)}`);
  }

  console.log(chalk.bold("\n  Plugins"));
  if (effective.plugins.length === 0) console.log(chalk.dim("    (all discovered plugins are active)"));
  for (const ref of effective.plugins) {
    const pin = ref.version ? `@${ref.version}` : "";
    const flag = ref.enabled === false ? chalk.red(" disabled") : "";
    console.log(`    ${ref.name}${pin}${flag}`);
  }

  const active = Object.entries(effective.active);
  if (active.length > 0) {
    console.log(chalk.bold("\n  Active"));
    for (const [capability, name] of active) console.log(`    ${capability}: ${name}`);
  }

  console.log(chalk.bold("\n  Gates"));
  for (const key of TRANSITION_KEYS) {
    const rule = effective.gates[key];
    if (rule) console.log(`    ${key}: ${describeGateRule(rule)}`);
  }

  if (effective.pluginDirs.length > 0) {
    console.log(chalk.bold("\n  Plugin directories"));
    for (const dir of effective.pluginDirs) console.log(`    ${dir}`);
  }

  for (const diagnostic of resolver.diagnostics()) {
    console.log(chalk.yellow(`\n  ! ${diagnostic.message}`));
  }
}

export function registerConfig(program: Command): void {
  const config = program.command("config").description("Read and write layered configuration");

  config
    .command("show")
    .description("Show the merged site, user and project configuration")
    .option("--json", "Output as JSON")
    .action((opts: { json?: boolean }) => {
      const resolver = getResolver();
      if (opts.json) {
        console.log(JSON.stringify(resolver.getEffectiveConfig(), null, 2));
        return;
      }
      showConfig(resolver);
    });

  config
    .command("get <key>")
    .description("Print a setting (the effective value unless --scope is given)")
    .addOption(scopeOption())
    .action((key: string, opts: { scope?: ConfigScope }) => {
      const resolver = getResolver();
      const value = opts.scope ? resolver.get(opts.scope, key) : resolver.resolve(key);
      if (value === NOT_CONFIGURED) {
        console.error(chalk.yellow(`${key} is not configured`));
        process.exit(1);
      }
      console.log(formatValue(value));
    });

  config
    .command("set <key> <value>")
    .description("Write a setting into one layer")
    .addOption(scopeOption().makeOptionMandatory())
    .action(async (key: string, raw: string, opts: { scope: ConfigScope }) => {
      const resolver = getResolver();
      const value = parseSettingValue(raw);
      try {
        resolver.set(opts.scope, key, value);
        await resolver.save(opts.scope);
      } catch (err) {
        exitWithError(err);
      }
      console.log(chalk.green(`Set ${key} = ${formatValue(value)} in ${opts.scope} config`));
    });

  config
    .command("unset <key>")
    .description("Remove a setting from one layer")
    .addOption(scopeOption().makeOptionMandatory())
    .action(async (key: string, opts: { scope: ConfigScope }) => {
      const resolver = getResolver();
      try {
        resolver.unset(opts.scope, key);
        await resolver.save(opts.scope);
      } catch (err) {
        exitWithError(err);
      }
      console.log(chalk.green(`Removed ${key} from ${opts.scope} config`));
    });
}
