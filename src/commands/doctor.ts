import chalk from "chalk";
import { Command } from "commander";
import { getCommandContext } from "../lib/command-context";
import { runPreflight } from "../lib/preflight";

export function registerDoctorCommand(program: Command): void {
  program
    .command("doctor")
    .description("Check host prerequisites for running test VMs")
    .action(async () => {
      const { config, tools } = await getCommandContext(program, { checkEnvironment: false });
      const report = await runPreflight(tools, { sshKeyPath: config.sshKeyPath });
      const suggestedCommands = new Set<string>();

      for (const check of report.checks) {
        const symbol = check.ok ? chalk.green("✔") : chalk.red("✖");
        console.log(`${symbol} ${check.message}`);
        if (!check.ok && check.fix) {
          console.log(`  fix: ${check.fix}`);
        }
        for (const command of check.ok ? [] : check.suggestedCommands ?? []) {
          console.log(`  please run: ${chalk.bold(command)}`);
          suggestedCommands.add(command);
        }
      }

      if (!report.ok) {
        if (suggestedCommands.size > 0) {
          console.log("");
          console.log(chalk.yellow("Action required: run the command(s) above, then re-run `snail-harness doctor`."));
        }
        process.exitCode = 1;
        throw new Error("Preflight failed.");
      }
    });
}
