import yargs from "yargs";
import { runAnalyze } from "@/commands/analyze";
import { runDownload } from "@/commands/download";
import { runPalette } from "@/commands/palette";
import { type AppConfig, loadConfig } from "@/lib/config";
import { ANALYSIS_TYPES, type CliCommand, CliCommandSchema, MODES } from "@/types/cli";

export function buildParser(argv: string[]) {
  return yargs(argv)
    .scriptName("logo-lens")
    .usage("Logo Processing Tool\n\nUsage: $0 <mode> [--type <type>]")
    .command("$0 [mode]", "Download, analyze or build palettes for logos", (y) =>
      y.positional("mode", {
        choices: MODES,
        describe: "Choose mode: download logos, analyze logos or create palettes",
      })
    )
    .option("type", {
      choices: ANALYSIS_TYPES,
      describe: "Choose analysis type (for analyze mode)",
    })
    .option("input", {
      type: "string",
      describe: "Dataset with a domain column, Parquet or CSV (for download mode)",
    })
    .example("$0 download --input logos.snappy.parquet", "Fetch and deduplicate logos")
    .example("$0 analyze --type emotion", "Write analysis_emotion.csv")
    .example("$0 palette", "Write one palette strip per logo")
    .help();
}

/**
 * Validate parsed arguments into a command. Null when the mode is missing
 * or analyze has no type.
 */
export function resolveCommand(args: unknown): CliCommand | null {
  const result = CliCommandSchema.safeParse(args);
  return result.success ? result.data : null;
}

export async function runCommand(command: CliCommand, config: AppConfig): Promise<void> {
  switch (command.mode) {
    case "download":
      await runDownload(config, { input: command.input });
      return;
    case "analyze":
      await runAnalyze(config, command.type);
      return;
    case "palette":
      await runPalette(config);
      return;
  }
}

export async function main(argv: string[]): Promise<void> {
  const parser = buildParser(argv);
  const args = await parser.parseAsync();

  const command = resolveCommand(args);
  if (!command) {
    console.log("Please provide a valid mode or analysis type.");
    parser.showHelp();
    return;
  }

  await runCommand(command, loadConfig());
}
