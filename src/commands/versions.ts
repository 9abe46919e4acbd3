import chalk from "chalk";
import fs from "node:fs";
import { Command } from "commander";
import { loadConfig } from "../lib/config";
import { baseImagePath } from "../lib/images";
import { CATALOG, codenameFor, knownVersions } from "../lib/specs";
import { DISTRIBUTIONS } from "../lib/types";

export function registerVersionsCommand(program: Command): void {
  program
    .command("versions")
    .description("List supported distributions and versions")
    .action(() => {
      const config = loadConfig();

      for (const distribution of DISTRIBUTIONS) {
        const entry = CATALOG[distribution];
        console.log(chalk.cyan(`${entry.label} (${distribution})`));
        for (const version of knownVersions(distribution)) {
          const spec = { distribution, version };
          const codename = codenameFor(spec);
          const label = codename === version || codename === `${entry.label} ${version}` ? version : `${version} (${codename})`;
          const local = fs.existsSync(baseImagePath(config.imageDir, spec)) ? chalk.green(" [downloaded]") : "";
          console.log(`  ${label}${local}`);
        }
        if (!entry.image) {
          console.log(chalk.dim("  images must be provided manually"));
        }
      }

      console.log("");
      console.log("Examples:");
      console.log("  snail-harness create --specs fedora:42,debian:12,ubuntu:24.04");
      console.log("  snail-harness create --distro debian --versions 12,11");
      console.log("  snail-harness setup --distro ubuntu --version 22.04");
    });
}
