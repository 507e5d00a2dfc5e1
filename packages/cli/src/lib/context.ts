/**
 * Core services for one CLI run.
 *
 * The config resolver is created on first use; commands that touch plugins or
 * assets also get a registry (built-ins plus configured plugin directories,
 * active plugins loaded) and a lifecycle manager that persists to the current
 * project's config.
 */

import { userInfo } from "node:os";
import {
  ENV,
  createConfigResolver,
  createLifecycleManager,
  createLogger,
  createPluginRegistry,
  createProjectAssetStore,
  logLevelFromEnv,
  resetConfigResolver,
  setConfigResolver,
  type ConfigResolver,
  type DiscoveryReport,
  type LifecycleManager,
  type LogLevel,
  type PluginRegistry,
} from "@greenlight/core";

export interface CliContext {
  resolver: ConfigResolver;
  registry: PluginRegistry;
  lifecycle: LifecycleManager;
  discovery: DiscoveryReport;
}

/** Warnings and errors only, unless GREENLIGHT_LOG_LEVEL asks for more */
export function cliLogLevel(env: Record<string, string | undefined> = process.env): LogLevel {
  return env[ENV.LOG_LEVEL] ? logLevelFromEnv(env) : "warn";
}

function currentUser(): string {
  return process.env.USER ?? userInfo().username;
}

let resolver: ConfigResolver | null = null;
let contextPromise: Promise<CliContext> | null = null;

export function getResolver(): ConfigResolver {
  if (!resolver) {
    resolver = createConfigResolver({ logger: createLogger("config", cliLogLevel()) });
    setConfigResolver(resolver);
  }
  return resolver;
}

/**
 * Get or create the full context.
 * Caches the Promise so concurrent callers share one discovery pass.
 */
export function getContext(): Promise<CliContext> {
  if (!contextPromise) {
    contextPromise = (async () => {
      const level = cliLogLevel();
      const config = getResolver();
      const registry = createPluginRegistry({
        resolver: config,
        logger: createLogger("plugins", level),
        // Built-in plugin packages are dependencies of the CLI, so resolve them from here
        importFn: (specifier) => import(specifier),
      });
      const discovery = await registry.discover();
      await registry.loadActive();

      const lifecycle = createLifecycleManager({
        resolver: config,
        registry,
        store: createProjectAssetStore(config),
        logger: createLogger("lifecycle", level),
        actor: currentUser(),
      });
      return { resolver: config, registry, lifecycle, discovery };
    })();
  }
  return contextPromise;
}

/** Unload plugins and flush pending config saves */
export async function closeContext(): Promise<void> {
  const pending = contextPromise;
  const config = resolver;
  contextPromise = null;
  resolver = null;

  if (pending) {
    const { registry } = await pending;
    await registry.close();
  }
  if (config) {
    await config.close();
    await resetConfigResolver();
  }
}
