import { Command } from "commander";
import { registerInit } from "./commands/init.js";
import { registerProject } from "./commands/project.js";
import { registerConfig } from "./commands/config.js";
import { registerPlugins } from "./commands/plugins.js";
import { registerAsset } from "./commands/asset.js";
import { registerStatus } from "./commands/status.js";
import { closeContext } from "./lib/context.js";

const program = new Command();

program
  .name("greenlight")
  .description("Greenlight — gated lifecycle tracking for production assets")
  .version("0.1.0");

registerInit(program);
registerProject(program);
registerConfig(program);
registerPlugins(program);
registerAsset(program);
registerStatus(program);

try {
  await program.parseAsync();
} finally {
  await closeContext();
}
