import type {
  DictionarySection,
  EntryKind,
  LookupOutcome,
  RtlDictionary,
} from "../entities/rtl-dictionary";

export class DictionaryLookup {
  constructor(private readonly dictionary: RtlDictionary) {}

  lookup(kind: EntryKind, key: string): LookupOutcome {
    const section = this.sectionFor(kind);
    // Exact match only: no trimming or case folding.
    if (Object.hasOwn(section, key)) {
      return { found: true, kind, entry: { key, explanation: section[key] ?? "" } };
    }
    return { found: false, kind, key };
  }

  private sectionFor(kind: EntryKind): DictionarySection {
    return kind === "prefix" ? this.dictionary.Prefixes : this.dictionary.Suffixes;
  }
}
