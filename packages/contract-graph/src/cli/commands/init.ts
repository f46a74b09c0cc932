/**
 * Init command - create the data directory with a default configuration
 */

import { existsSync } from "node:fs";
import { mkdir, writeFile } from "node:fs/promises";
import { join, resolve } from "node:path";
import type { Command } from "commander";
import pc from "picocolors";
import { defaultConfigFile } from "../../config.js";
import { FaultlinePaths } from "../../constants.js";

export function initCommand(program: Command): void {
  program
    .command("init")
    .description("Create .faultline/config.json in the project directory")
    .option("-f, --force", "Overwrite an existing configuration")
    .action(async (options: { force?: boolean }) => {
      const { project } = program.opts<{ project?: string }>();
      const dataDir = join(resolve(project ?? "."), FaultlinePaths.base);
      const configPath = join(dataDir, FaultlinePaths.configFile);

      if (existsSync(configPath) && !options.force) {
        console.log(pc.yellow(`${configPath} already exists. Use --force to overwrite.`));
        return;
      }

      await mkdir(dataDir, { recursive: true });
      await writeFile(configPath, `${JSON.stringify(defaultConfigFile(), null, 2)}\n`);

      console.log(pc.green(`Created ${configPath}`));
      console.log();
      console.log(pc.bold("Next steps:"));
      console.log(`  1. ${pc.cyan("faultline register <name> <path>")} for each repository`);
      console.log(`  2. ${pc.cyan("faultline scan <name>")} to store a first version`);
      console.log(`  3. ${pc.cyan("faultline consumers add <consumer> <producer> <method> <path>")}`);
      console.log(`  4. ${pc.cyan("faultline impact <name>")} after changing a producer`);
    });
}
