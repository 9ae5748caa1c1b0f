/**
 * Command-line interface for the preview extractor.
 *
 * Usage:
 *   extract-preview-data <config-path> <output-path>
 *
 * Exit codes:
 *   0 - Preview data written
 *   1 - Wrong arguments, unreadable/invalid config, or unwritable output
 */

import { Command, CommanderError } from "commander";

import { extractPreview } from "./preview/io.js";
import { UsageError, toErrorV1 } from "./utils/errors.js";
import { TelemetryEvents, emit } from "./utils/telemetry.js";
import { TOOL_VERSION } from "./version.js";

export const USAGE = "Usage: extract-preview-data <config-path> <output-path>";

export interface CliOutput {
  writeOut(text: string): void;
  writeErr(text: string): void;
}

const processOutput: CliOutput = {
  writeOut: (text) => process.stdout.write(text),
  writeErr: (text) => process.stderr.write(text),
};

export function createProgram(output: CliOutput): Command {
  return new Command()
    .name("extract-preview-data")
    .description(
      "Extract platform_info preview data from a platform YAML or Kubernetes ConfigMap YAML"
    )
    .version(TOOL_VERSION)
    .argument("[config-path]", "platform YAML, or a ConfigMap embedding it as data[\"platform.yaml\"]")
    .argument("[output-path]", "JSON file to write (overwritten)")
    .allowExcessArguments(true)
    .exitOverride()
    .configureOutput({
      writeOut: (text) => output.writeOut(text),
      writeErr: (text) => output.writeErr(text),
    });
}

function reportFailure(err: unknown, output: CliOutput): number {
  if (err instanceof UsageError) {
    output.writeErr(`${USAGE}\n`);
    return 1;
  }

  const body = toErrorV1(err);
  emit(TelemetryEvents.ExtractFailed, { code: body.code, message: body.message, details: body.details });
  output.writeErr(`Error: ${body.message}\n`);
  return 1;
}

/**
 * Run the extractor for `argv` (arguments after the executable and script).
 * Resolves to the process exit status; never rejects.
 */
export async function runCli(
  argv: readonly string[],
  output: CliOutput = processOutput
): Promise<number> {
  const program = createProgram(output);

  try {
    program.parse([...argv], { from: "user" });
  } catch (err) {
    // --help and --version land here with exit code 0
    if (err instanceof CommanderError) return err.exitCode;
    return reportFailure(err, output);
  }

  const [configPath, outputPath] = program.args;

  try {
    if (configPath === undefined || outputPath === undefined) {
      throw new UsageError();
    }
    await extractPreview(configPath, outputPath);
    return 0;
  } catch (err) {
    return reportFailure(err, output);
  }
}
