import type { Command } from "commander";
import { loadConfig, type HarnessConfig } from "./config";
import { HostTools, runCommand } from "./exec";
import { VirshHypervisor, type Hypervisor } from "./hypervisor";
import { createConsoleLogger, type Logger } from "./log";
import { assertEnvironment } from "./preflight";
import type { SshSettings } from "./status";

export interface GlobalOptions {
  verbose?: boolean;
}

export interface CommandContext {
  config: HarnessConfig;
  tools: HostTools;
  hypervisor: Hypervisor;
  logger: Logger;
  ssh: SshSettings;
}

export interface CommandContextOptions {
  checkEnvironment?: boolean;
}

export async function getCommandContext(program: Command, options: CommandContextOptions = {}): Promise<CommandContext> {
  const { verbose } = program.opts<GlobalOptions>();
  const config = loadConfig();
  const logger = createConsoleLogger({ verbose });
  const tools = new HostTools(runCommand, config.sudo);

  if (options.checkEnvironment !== false) {
    await assertEnvironment(tools);
  }

  return {
    config,
    tools,
    hypervisor: new VirshHypervisor(tools),
    logger,
    ssh: { keyPath: config.sshKeyPath, user: config.vmUser }
  };
}
