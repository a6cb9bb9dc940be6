import { Command, type OutputConfiguration } from "commander";
import { z } from "zod";
import { HELP_TEXT } from "../../domain/constants/messages";

export const CLI_NAME = "rtl-meaning";
export const CLI_VERSION = "1.0.0";

// An empty value counts as not supplied.
const optionalValue = z
  .string()
  .optional()
  .transform((value) => (value ? value : undefined));

const cliOptionsSchema = z.object({
  prefix: optionalValue,
  suffix: optionalValue,
  list_all: z.boolean().optional().default(false),
  path_to_dict: optionalValue,
});

export type CliOptions = z.infer<typeof cliOptionsSchema>;

export function createCheckMeaningCommand(output?: OutputConfiguration): Command {
  const command = new Command()
    .name(CLI_NAME)
    .description("Explain the prefixes and suffixes used in RTL signal names.")
    .version(CLI_VERSION)
    .option("--prefix <value>", HELP_TEXT.prefix)
    .option("--suffix <value>", HELP_TEXT.suffix)
    .option("--list_all", HELP_TEXT.listAll)
    .option("--path_to_dict <value>", HELP_TEXT.pathToDict)
    .allowExcessArguments(false)
    .exitOverride();

  if (output) {
    command.configureOutput(output);
  }
  return command;
}

/**
 * Parses a full process argv (node binary and script path first).
 * Throws CommanderError for --help, --version and malformed input.
 */
export function parseCheckMeaningArguments(
  argv: readonly string[],
  output?: OutputConfiguration,
): CliOptions {
  const command = createCheckMeaningCommand(output);
  command.parse([...argv], { from: "node" });
  return cliOptionsSchema.parse(command.opts());
}

export function countRequestedOperations(options: CliOptions): number {
  return [options.prefix !== undefined, options.suffix !== undefined, options.list_all].filter(
    Boolean,
  ).length;
}
