import { Command } from "commander";
import { getCommandContext } from "../lib/command-context";
import { runInteractive } from "../lib/exec";
import { selectFleetDomains } from "../lib/hypervisor";

export function registerConsoleCommand(program: Command): void {
  program
    .command("console <name>")
    .description("Attach to a VM's serial console")
    .action(async (name: string) => {
      const { config, tools, hypervisor } = await getCommandContext(program);
      await selectFleetDomains(hypervisor, { kind: "one", name, prefix: config.prefix });

      console.log("Attaching to serial console. Press Ctrl+] to detach.");
      const argv = tools.privilegedArgv("virsh", ["console", name]);
      const exitCode = await runInteractive(argv.command, argv.args);
      if (exitCode !== 0) {
        process.exitCode = exitCode;
      }
    });
}
