/** Returned by config reads when a key exists in no layer. */
export const NOT_CONFIGURED: unique symbol = Symbol.for("greenlight.not-configured");

/** Environment variables the core reads */
export const ENV = {
  SITE_CONFIG: "GREENLIGHT_SITE_CONFIG",
  USER_DIR: "GREENLIGHT_USER_DIR",
  PLUGIN_DIRS: "GREENLIGHT_PLUGIN_DIRS",
  LOG_LEVEL: "GREENLIGHT_LOG_LEVEL",
} as const;

/** Per-user and per-project config directory name */
export const CONFIG_DIR_NAME = ".greenlight";
export const USER_CONFIG_FILE = "user.yaml";
export const PROJECT_CONFIG_FILE = "project.yaml";

/** How many recently opened projects the user layer remembers */
export const MAX_RECENT_PROJECTS = 10;

/** Built-in plugin packages, imported by name during discovery */
export const BUILTIN_PLUGINS: readonly string[] = [
  "@greenlight/plugin-filemanager-local",
  "@greenlight/plugin-taskmanager-local",
  "@greenlight/plugin-application-exec",
  "@greenlight/plugin-notifier-webhook",
];
