import chalk from "chalk";
import { Command } from "commander";
import { registerConsoleCommand } from "./commands/console";
import { registerCreateCommand } from "./commands/create";
import { registerDestroyCommand } from "./commands/destroy";
import { registerDoctorCommand } from "./commands/doctor";
import { registerInventoryCommand } from "./commands/inventory";
import { registerSetupCommand } from "./commands/setup";
import { registerSshCommand } from "./commands/ssh";
import { registerStartCommand } from "./commands/start";
import { registerStatusCommand } from "./commands/status";
import { registerStopCommand } from "./commands/stop";
import { registerVersionsCommand } from "./commands/versions";
import { CLI_NAME } from "./lib/constants";
import { renderCliError, toCliError } from "./lib/errors";
import { readPackageMeta } from "./lib/package";

const pkg = readPackageMeta();
const program = new Command();

// Global options go before the subcommand, so `setup --version` stays the release flag.
program
  .name(CLI_NAME)
  .description("Provision and manage libvirt test VMs running the Snail Core agent")
  .version(pkg.version ?? "0.0.0", "-V, --version", "output the version number")
  .option("--verbose", "Print debug output")
  .enablePositionalOptions();

registerDoctorCommand(program);
registerVersionsCommand(program);
registerSetupCommand(program);
registerCreateCommand(program);
registerStatusCommand(program);
registerStartCommand(program);
registerStopCommand(program);
registerSshCommand(program);
registerConsoleCommand(program);
registerInventoryCommand(program);
registerDestroyCommand(program);

program.parseAsync(process.argv).catch((error: unknown) => {
  const cliError = toCliError(error);
  console.error(chalk.red(renderCliError(cliError)));
  process.exitCode = cliError.exitCode;
});
