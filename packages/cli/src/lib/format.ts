import chalk from "chalk";
import {
  NOT_CONFIGURED,
  errorMessage,
  type LifecycleState,
  type NotConfigured,
  type PluginLoadState,
  type SettingValue,
  type TransitionOutcome,
} from "@greenlight/core";

export function header(title: string): string {
  const line = "─".repeat(76);
  return [
    chalk.dim(`┌${line}┐`),
    chalk.dim("│") + chalk.bold(` ${title}`.padEnd(76)) + chalk.dim("│"),
    chalk.dim(`└${line}┘`),
  ].join("\n");
}

export function banner(title: string): string {
  const line = "═".repeat(76);
  return [
    chalk.dim(`╔${line}╗`),
    chalk.dim("║") + chalk.bold.cyan(` ${title}`.padEnd(76)) + chalk.dim("║"),
    chalk.dim(`╚${line}╝`),
  ].join("\n");
}

export function formatAge(date: Date, now: number = Date.now()): string {
  const diff = Math.max(0, Math.floor((now - date.getTime()) / 1000));
  if (diff < 60) return `${diff}s ago`;
  if (diff < 3600) return `${Math.floor(diff / 60)}m ago`;
  if (diff < 86400) return `${Math.floor(diff / 3600)}h ago`;
  return `${Math.floor(diff / 86400)}d ago`;
}

export function stateColor(state: LifecycleState): string {
  switch (state) {
    case "idea":
      return chalk.gray(state);
    case "candidate":
      return chalk.cyan(state);
    case "in_development":
      return chalk.yellow(state);
    case "review":
      return chalk.blue(state);
    case "production_ready":
      return chalk.green(state);
    case "rejected":
      return chalk.red(state);
  }
}

export function pluginStateColor(state: PluginLoadState): string {
  switch (state) {
    case "loaded":
      return chalk.green(state);
    case "failed":
      return chalk.red(state);
    case "loading":
      return chalk.cyan(state);
    case "unloaded":
      return chalk.gray(state);
  }
}

export function outcomeColor(outcome: TransitionOutcome): string {
  switch (outcome) {
    case "applied":
      return chalk.green(outcome);
    case "refused":
      return chalk.yellow(outcome);
    case "failed":
      return chalk.red(outcome);
  }
}

/** Setting values as typed on the command line: strings bare, everything else as JSON */
export function formatValue(value: SettingValue | NotConfigured): string {
  if (value === NOT_CONFIGURED) return "<not configured>";
  return typeof value === "string" ? value : JSON.stringify(value);
}

/** Print an error in red and exit 1 */
export function exitWithError(err: unknown): never {
  console.error(chalk.red(errorMessage(err)));
  process.exit(1);
}
