import chalk from "chalk";
import { Command } from "commander";
import inquirer from "inquirer";
import ora from "ora";
import { getCommandContext } from "../lib/command-context";
import { DEFAULT_DISTRIBUTION } from "../lib/constants";
import { ImageResolver, inspectImage } from "../lib/images";
import { CATALOG, expandVersions, formatSpec, isDistribution, knownVersions, validateSpec } from "../lib/specs";

interface SetupOptions {
  distro?: string;
  version?: string;
  force?: boolean;
  yes?: boolean;
}

export function registerSetupCommand(program: Command): void {
  program
    .command("setup")
    .description("Download and verify a base cloud image")
    .option("--distro <name>", "Distribution", DEFAULT_DISTRIBUTION)
    .option("--version <version>", "Release version (default: newest known)")
    .option("-f, --force", "Re-download even if the image exists")
    .option("-y, --yes", "Keep an existing image without prompting")
    .action(async (options: SetupOptions) => {
      const distro = (options.distro ?? DEFAULT_DISTRIBUTION).trim().toLowerCase();
      const version = options.version ?? (isDistribution(distro) ? knownVersions(distro)[0] : "");
      const [spec] = expandVersions(distro, version);
      validateSpec(spec);

      const { config, tools, logger } = await getCommandContext(program);
      const resolver = new ImageResolver({ imageDir: config.imageDir, tools, logger });
      const localPath = resolver.localPath(spec);

      let force = Boolean(options.force);
      if (!force && (await resolver.hasLocal(spec))) {
        logger.warn(`Base image already exists at ${localPath}`);
        if (!options.yes && process.stdout.isTTY) {
          const answer = await inquirer.prompt<{ redownload: boolean }>([
            {
              type: "confirm",
              name: "redownload",
              message: "Do you want to re-download?",
              default: false
            }
          ]);
          force = answer.redownload;
        }
      }

      const image = await resolver.resolve(spec, { force });

      const spinner = ora(`Verifying ${image.localPath}...`).start();
      try {
        const info = await inspectImage(tools, image.localPath);
        const size =
          typeof info.virtualSizeBytes === "number" ? `${(info.virtualSizeBytes / 1024 ** 3).toFixed(1)} GiB` : "unknown size";
        spinner.succeed(`Image OK: format ${info.format}, virtual size ${size}`);
      } catch (error) {
        spinner.fail("qemu-img could not read the image.");
        throw error;
      }

      console.log(`${CATALOG[spec.distribution].label} ${spec.version} base image: ${chalk.bold(image.localPath)}`);
      console.log(`Next: run ${chalk.bold(`snail-harness create --specs ${formatSpec(spec)}`)}.`);
    });
}
