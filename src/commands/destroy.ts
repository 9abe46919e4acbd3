import chalk from "chalk";
import { Command } from "commander";
import inquirer from "inquirer";
import { getCommandContext } from "../lib/command-context";
import { destroyFleet } from "../lib/destroyer";
import { CliError } from "../lib/errors";
import { selectFleetDomains, type FleetSelector } from "../lib/hypervisor";

interface DestroyOptions {
  force?: boolean;
  vm?: string;
  prefix?: string;
}

export function registerDestroyCommand(program: Command): void {
  program
    .command("destroy")
    .description("Destroy test VMs along with their disks and cloud-init data")
    .option("-f, --force", "Skip confirmation")
    .option("--vm <name>", "Destroy a single VM")
    .option("--prefix <prefix>", "VM name prefix")
    .action(async (options: DestroyOptions) => {
      const { config, tools, hypervisor, logger } = await getCommandContext(program);
      const prefix = options.prefix ?? config.prefix;
      const selector: FleetSelector = options.vm ? { kind: "one", name: options.vm, prefix } : { kind: "all", prefix };

      const names = await selectFleetDomains(hypervisor, selector);
      if (names.length === 0) {
        console.log(`No VMs found with prefix '${prefix}'.`);
        return;
      }

      console.log(chalk.yellow(`The following VM(s) will be destroyed:`));
      for (const name of names) {
        console.log(`  - ${name}`);
      }

      if (!options.force) {
        if (!process.stdout.isTTY) {
          throw new CliError({
            kind: "validation",
            message: "Destroy confirmation requires a TTY.",
            hint: "Re-run with --force in non-interactive mode."
          });
        }
        const answer = await inquirer.prompt<{ proceed: boolean }>([
          {
            type: "confirm",
            name: "proceed",
            message: `Destroy ${names.length} VM(s) and their disks permanently?`,
            default: false
          }
        ]);
        if (!answer.proceed) {
          console.log("Cancelled.");
          return;
        }
      }

      const report = await destroyFleet(selector, {
        hypervisor,
        tools,
        imageDir: config.imageDir,
        seedDir: config.seedDir,
        manifestPath: config.manifestPath,
        logger
      });

      console.log("");
      console.log(`Destroyed: ${report.destroyed.length}/${names.length}`);
      if (report.failures.length > 0) {
        for (const failure of report.failures) {
          console.log(chalk.red(`  ${failure.target} (${failure.step}): ${failure.message}`));
        }
        process.exitCode = 1;
      }
    });
}
