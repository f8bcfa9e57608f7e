export enum Language {
  ENGLISH = 'en',
  HINDI = 'hi',
  GUJARATI = 'gu',
}

export const LANGUAGES: readonly Language[] = [
  Language.ENGLISH,
  Language.HINDI,
  Language.GUJARATI,
];

export function isLanguage(value: unknown): value is Language {
  return LANGUAGES.some((language) => language === value);
}

/** Per-language string table, e.g. response templates or assistant names. */
export type Localized<T = string> = Record<Language, T>;

export type NormalizedUtterance =
  | { kind: 'text'; text: string; language: Language }
  | { kind: 'empty'; language: Language };
