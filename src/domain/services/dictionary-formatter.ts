import { formatMessage } from "../constants/messages";
import type {
  DictionarySection,
  LookupOutcome,
  RtlDictionary,
} from "../entities/rtl-dictionary";

const BANNER = "=======================================";

export const PREFIX_SECTION_HEADER = `${BANNER}\n            Prefixes\n${BANNER}\n\n`;
export const SUFFIX_SECTION_HEADER = `\n${BANNER}\n            Suffixes\n${BANNER}\n\n`;

export class DictionaryFormatter {
  constructor(private readonly fileName: string) {}

  formatLookup(outcome: LookupOutcome): string {
    if (outcome.found) {
      return formatMessage("explanation", outcome.entry.key, outcome.entry.explanation);
    }
    return formatMessage("notFound", outcome.kind, outcome.key, this.fileName);
  }

  formatListing(dictionary: RtlDictionary): string {
    return (
      PREFIX_SECTION_HEADER +
      formatSection(dictionary.Prefixes) +
      SUFFIX_SECTION_HEADER +
      formatSection(dictionary.Suffixes)
    );
  }
}

function formatSection(section: DictionarySection): string {
  return Object.entries(section)
    .map(([key, explanation]) => `${formatMessage("explanation", key, explanation)}\n`)
    .join("");
}
