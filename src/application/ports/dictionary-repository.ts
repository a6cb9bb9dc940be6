import type { RtlDictionary } from "../../domain/entities/rtl-dictionary";

export interface DictionaryRepository {
  load(directory: string): RtlDictionary;
}
