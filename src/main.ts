import { booleanArg, parseArgs, stringArg } from "./lib/args";
import { loadConfig } from "./lib/config";
import { ConfigurationError, errorMessage } from "./lib/errors";
import { NodeExecutor } from "./lib/executor";
import { formatDuration } from "./lib/format";
import { createConsoleLogger, type Logger } from "./lib/log";
import { CliProfileStore } from "./lib/profile-store";
import type { ProfileStore } from "./lib/profiles";
import { provision } from "./lib/provision";
import pkg from "../package.json";

export const VERSION: string = pkg.version;

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_CONFIGURATION = 2;

export function usage(): string {
  return `image-profile-setup v${VERSION}\n\n` +
`Prepare a software profile for image-based (disk clone) provisioning.\n\n` +
`Usage:\n  image-profile-setup --image-name <name> --software-profile <name> --hardware-profile <name> [options]\n\n` +
`Options:\n  --image-name <name>              Image directory under the image root (required)\n  --software-profile <name>        Software profile to configure (required)\n  --hardware-profile <name>        Hardware profile with install type image-deploy (required)\n  --src-software-profile <name>    Clone this software profile first\n  --force                          Replace an existing target profile when cloning\n  --image-root <path>              Image root directory (default IMAGE_ROOT or /home/partimag)\n  --verbose                        Debug logs and duration summary\n  -h, --help                       Show help\n  -v, --version                    Show version\n`;
}

export type MainOverrides = {
  env?: Record<string, string | undefined>;
  store?: ProfileStore;
  log?: Logger;
};

export async function main(argv: string[], overrides: MainOverrides = {}): Promise<number> {
  if (argv.includes("-h") || argv.includes("--help")) { console.log(usage()); return EXIT_OK; }
  if (argv.includes("-v") || argv.includes("--version")) { console.log(VERSION); return EXIT_OK; }

  const startTime = Date.now();
  let log = overrides.log ?? createConsoleLogger(argv.includes("--verbose"));

  try {
    const { args, positional } = parseArgs(argv, [
      { name: "src-software-profile", type: "string" },
      { name: "software-profile", type: "string" },
      { name: "hardware-profile", type: "string" },
      { name: "image-name", type: "string" },
      { name: "image-root", type: "string" },
      { name: "force", type: "boolean" },
      { name: "verbose", type: "boolean" },
    ]);
    if (positional.length) throw new Error(`Unexpected argument: ${positional[0]}`);

    const config = loadConfig(overrides.env ?? process.env);
    const imageRoot = stringArg(args, "image-root");
    if (imageRoot) config.imageRoot = imageRoot;
    if (booleanArg(args, "verbose")) config.verbose = true;
    if (!overrides.log && config.verbose) log = createConsoleLogger(true);

    const required = ["image-name", "software-profile", "hardware-profile"].filter((k) => !stringArg(args, k));
    if (required.length) throw new Error(`Missing required option(s): ${required.map((k) => `--${k}`).join(", ")}`);

    const store = overrides.store ?? new CliProfileStore(new NodeExecutor(), config.profileCli);
    log.debug(`Image root: ${config.imageRoot}, profile tool: ${config.profileCli}`);

    const profile = await provision({ store, config, log }, {
      imageName: stringArg(args, "image-name") ?? "",
      softwareProfile: stringArg(args, "software-profile") ?? "",
      hardwareProfile: stringArg(args, "hardware-profile") ?? "",
      sourceSoftwareProfile: stringArg(args, "src-software-profile"),
      force: booleanArg(args, "force"),
    });

    log.info(`✓ Software profile '${profile.name}' ready (${profile.partitions.length} partition(s))`);
    if (config.verbose) {
      log.info(`[DURATION] ${formatDuration(Date.now() - startTime)}`);
    }
    return EXIT_OK;
  } catch (e) {
    if (e instanceof ConfigurationError) {
      log.error(e.message);
      for (const line of e.guidance) log.error(line);
      return EXIT_CONFIGURATION;
    }
    log.error(errorMessage(e));
    return EXIT_FAILURE;
  }
}
