import { mkdirSync, mkdtempSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { vi } from "vitest";
import { Command } from "commander";

export interface Sandbox {
  baseDir: string;
  userDir: string;
  sitePath: string;
  projectRoot: string;
  cleanup(): void;
}

/** Temp site/user/project locations wired through the environment */
export function createSandbox(): Sandbox {
  const baseDir = mkdtempSync(join(tmpdir(), "greenlight-cli-"));
  const userDir = join(baseDir, "user");
  const sitePath = join(baseDir, "site.yaml");
  const projectRoot = join(baseDir, "fenwick");
  mkdirSync(projectRoot);

  vi.stubEnv("GREENLIGHT_USER_DIR", userDir);
  vi.stubEnv("GREENLIGHT_SITE_CONFIG", sitePath);
  vi.stubEnv("GREENLIGHT_PLUGIN_DIRS", "");
  vi.stubEnv("GREENLIGHT_LOG_LEVEL", "silent");
  vi.stubEnv("USER", "tester");

  return {
    baseDir,
    userDir,
    sitePath,
    projectRoot,
    cleanup() {
      vi.unstubAllEnvs();
      rmSync(baseDir, { recursive: true, force: true });
    },
  };
}

/** Silence console output and turn process.exit into a throw */
export function captureConsole(): { output(): string; errors(): string; lastLog(): string } {
  const log = vi.spyOn(console, "log").mockImplementation(() => {});
  const error = vi.spyOn(console, "error").mockImplementation(() => {});
  vi.spyOn(process, "exit").mockImplementation((code) => {
    throw new Error(`process.exit(${code})`);
  });
  return {
    output: () => log.mock.calls.map((c) => String(c[0])).join("\n"),
    errors: () => error.mock.calls.map((c) => String(c[0])).join("\n"),
    lastLog: () => String(log.mock.calls.at(-1)?.[0] ?? ""),
  };
}

export async function run(register: (program: Command) => void, ...args: string[]): Promise<void> {
  const program = new Command();
  program.exitOverride();
  register(program);
  await program.parseAsync(["node", "greenlight", ...args]);
}
