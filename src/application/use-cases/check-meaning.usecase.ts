import type { EntryKind } from "../../domain/entities/rtl-dictionary";
import type { DictionaryFormatter } from "../../domain/services/dictionary-formatter";
import { DictionaryLookup } from "../../domain/services/dictionary-lookup";
import type { DictionaryRepository } from "../ports/dictionary-repository";
import type { OutputSink } from "../ports/output-sink";

interface CheckMeaningUseCaseDependencies {
  readonly repository: DictionaryRepository;
  readonly formatter: DictionaryFormatter;
  readonly sink: OutputSink;
}

export interface CheckMeaningRequest {
  readonly directory: string;
  readonly prefix?: string;
  readonly suffix?: string;
  readonly listAll: boolean;
}

export class CheckMeaningUseCase {
  private readonly repository: DictionaryRepository;
  private readonly formatter: DictionaryFormatter;
  private readonly sink: OutputSink;

  constructor({ repository, formatter, sink }: CheckMeaningUseCaseDependencies) {
    this.repository = repository;
    this.formatter = formatter;
    this.sink = sink;
  }

  execute({ directory, prefix, suffix, listAll }: CheckMeaningRequest): void {
    const dictionary = this.repository.load(directory);
    const lookup = new DictionaryLookup(dictionary);

    // Every requested operation runs, in this order, against the same dictionary.
    const requests: Array<[EntryKind, string | undefined]> = [
      ["prefix", prefix],
      ["suffix", suffix],
    ];
    for (const [kind, key] of requests) {
      if (key === undefined) {
        continue;
      }
      this.sink.write(this.formatter.formatLookup(lookup.lookup(kind, key)));
    }

    if (listAll) {
      this.sink.write(this.formatter.formatListing(dictionary));
    }
  }
}
