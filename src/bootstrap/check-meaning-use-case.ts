import type { OutputSink } from "../application/ports/output-sink";
import { CheckMeaningUseCase } from "../application/use-cases/check-meaning.usecase";
import { DictionaryFormatter } from "../domain/services/dictionary-formatter";
import type { DictionaryConfig } from "../infrastructure/config/config-manager";
import { JsonDictionaryRepository } from "../infrastructure/data/json-dictionary.repository";
import type { ILogger } from "../infrastructure/logging/logger";

interface BuildCheckMeaningDependencies {
  readonly dictionary: DictionaryConfig;
  readonly sink: OutputSink;
  readonly logger: ILogger;
}

export function buildCheckMeaningUseCase({
  dictionary,
  sink,
  logger,
}: BuildCheckMeaningDependencies): CheckMeaningUseCase {
  const repository = new JsonDictionaryRepository({
    fileName: dictionary.fileName,
    sink,
    logger,
  });
  return new CheckMeaningUseCase({
    repository,
    formatter: new DictionaryFormatter(dictionary.fileName),
    sink,
  });
}
