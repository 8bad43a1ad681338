// cli.ts

import { Command, CommanderError } from "commander";

import { ConfigError, DEFAULT_CONFIG_PATH, loadConfigFile, readEnvOverrides, resolveSettings } from "./config.ts";
import { RequestError } from "./aviasales.ts";
import { DeliveryError } from "./telegram.ts";
import { runScan } from "./scanner.ts";

export function describeFailure(e: unknown): string {
  if (e instanceof ConfigError) return `Config error: ${e.message}`;
  if (e instanceof RequestError) return `Search failed: ${e.message}`;
  if (e instanceof DeliveryError) return `Notification failed: ${e.message}`;
  return e instanceof Error ? (e.stack ?? e.message) : String(e);
}

/**
 * Parse the user arguments (without node and script path), run one scan and
 * return the process exit code.
 */
export async function runCli(
  argv: string[],
  env: Record<string, string | undefined> = process.env,
): Promise<number> {
  const program = new Command();

  program
    .name("flight-deal-alert")
    .description("Search cheap one-way flights from an airport and send the deals to Telegram.")
    .version("0.1.0")
    .option("-c, --config <path>", "JSON config file", DEFAULT_CONFIG_PATH)
    .option("--dry-run", "search and filter, print the messages instead of sending them", false)
    .exitOverride()
    .action(async (opts: { config: string; dryRun: boolean }) => {
      const settings = resolveSettings(await loadConfigFile(opts.config), readEnvOverrides(env));
      await runScan({ settings, dryRun: opts.dryRun });
      console.log("Done");
    });

  try {
    await program.parseAsync(argv, { from: "user" });
    return 0;
  } catch (e) {
    // --help and --version end here too, with exit code 0
    if (e instanceof CommanderError) return e.exitCode;
    console.error(describeFailure(e));
    return 1;
  }
}
