import type { RtlDictionary } from "../entities/rtl-dictionary";

export const DICTIONARY_FILE_NAME = "rtl_dictionary.json";

// Used whenever the dictionary file exists but holds nothing parseable.
export const DEFAULT_DICTIONARY: RtlDictionary = {
  Prefixes: {
    aref_: "Indicates that the signal is to do with the auto-refresh logic.",
    mmu_: "Indicates that the signal is coming from the memory-management unit.",
  },
  Suffixes: {
    _req: "Indicates a request line.",
    _ctrl: "Indicates a control signal or a signal from a control block.",
  },
};

export function createDefaultDictionary(): RtlDictionary {
  return {
    Prefixes: { ...DEFAULT_DICTIONARY.Prefixes },
    Suffixes: { ...DEFAULT_DICTIONARY.Suffixes },
  };
}
