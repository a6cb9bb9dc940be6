export type DictionarySection = Readonly<Record<string, string>>;

export interface RtlDictionary {
  readonly Prefixes: DictionarySection;
  readonly Suffixes: DictionarySection;
}

export type EntryKind = "prefix" | "suffix";

export interface DictionaryEntry {
  readonly key: string;
  readonly explanation: string;
}

export type LookupOutcome =
  | { readonly found: true; readonly kind: EntryKind; readonly entry: DictionaryEntry }
  | { readonly found: false; readonly kind: EntryKind; readonly key: string };
