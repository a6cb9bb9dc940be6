import { CommanderError, type OutputConfiguration } from "commander";
import { type OutputSink, stdoutSink } from "../application/ports/output-sink";
import { buildCheckMeaningUseCase } from "../bootstrap/check-meaning-use-case";
import { formatMessage } from "../domain/constants/messages";
import { ConfigManager } from "../infrastructure/config/config-manager";
import { ErrorHandler, EXIT_CODES, UsageError } from "../infrastructure/error/error-handler";
import { ConsoleLogger, type ILogger, toLogLevel } from "../infrastructure/logging/logger";
import {
  countRequestedOperations,
  parseCheckMeaningArguments,
} from "../interface/cli/check-meaning-command";

export interface RunCliOptions {
  readonly config?: ConfigManager;
  readonly sink?: OutputSink;
  readonly logger?: ILogger;
  readonly programOutput?: OutputConfiguration;
}

/**
 * Runs one invocation and returns the process exit code.
 * @param argv - full process argv, node binary and script path included
 */
export function runCli(argv: readonly string[], options: RunCliOptions = {}): number {
  const config = options.config ?? ConfigManager.fromEnvironment(process.env);
  const sink = options.sink ?? stdoutSink;
  const logger =
    options.logger ?? new ConsoleLogger(toLogLevel(config.getLoggingConfig().level));
  const errorHandler = new ErrorHandler(logger);

  if (argv.length <= 2) {
    sink.write(formatMessage("noArgs"));
    return 0;
  }

  try {
    const cliOptions = parseCheckMeaningArguments(argv, options.programOutput);

    if (config.getUsageConfig().exclusiveSwitches && countRequestedOperations(cliOptions) > 1) {
      throw new UsageError(formatMessage("unsupportedUsage"));
    }

    const dictionary = config.getDictionaryConfig();
    const directory = cliOptions.path_to_dict ?? dictionary.defaultDirectory;
    logger.debug("Running lookup", { directory, options: cliOptions });

    buildCheckMeaningUseCase({ dictionary, sink, logger }).execute({
      directory,
      prefix: cliOptions.prefix,
      suffix: cliOptions.suffix,
      listAll: cliOptions.list_all,
    });
    return 0;
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    if (error instanceof UsageError) {
      sink.write(error.message);
      return EXIT_CODES[error.type];
    }
    return errorHandler.handleFatal(error);
  }
}
