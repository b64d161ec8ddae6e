export interface Keyword {
  readonly name: string;
  readonly language: string;
  readonly modelPath: string;
}

export type KeywordMap = ReadonlyMap<string, Keyword>;

/** Language code -> path of the Porcupine `.pv` language model. */
export type LanguageModelMap = ReadonlyMap<string, string>;
