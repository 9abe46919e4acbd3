import { Command } from "commander";
import { getCommandContext } from "../lib/command-context";
import { CliError } from "../lib/errors";
import { runInteractive } from "../lib/exec";
import { isPrivateIPv4, selectFleetDomains } from "../lib/hypervisor";
import { buildSshArgs } from "../lib/status";

export function registerSshCommand(program: Command): void {
  program
    .command("ssh <name>")
    .description("Open an SSH session to a running test VM")
    .action(async (name: string) => {
      const { config, hypervisor, ssh } = await getCommandContext(program);
      await selectFleetDomains(hypervisor, { kind: "one", name, prefix: config.prefix });

      const state = await hypervisor.domainState(name);
      if (state !== "running") {
        throw new CliError({
          kind: "validation",
          message: `VM '${name}' is not running (state: ${state}).`,
          hint: `Run \`snail-harness start --vm ${name}\` first.`
        });
      }

      const ip = (await hypervisor.domainAddresses(name)).find(isPrivateIPv4);
      if (!ip) {
        throw new CliError({
          kind: "runtime",
          message: `VM '${name}' has no IP address yet.`,
          hint: "Wait for the guest to finish booting, then retry."
        });
      }

      console.log(`Connecting to ${name} (${ip}). Use Ctrl+D or 'exit' to return.`);
      const exitCode = await runInteractive("ssh", buildSshArgs(ssh, ip, [], false));
      if (exitCode !== 0) {
        process.exitCode = exitCode;
      }
    });
}
