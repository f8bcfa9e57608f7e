import { Injectable } from '@nestjs/common';
import { isLanguage, Language, NormalizedUtterance } from './language.types';

const DEVANAGARI = /[ऀ-ॿ]/u;
const GUJARATI = /[઀-૿]/u;
const LATIN = /\p{Script=Latin}/u;
const TERMINAL_PUNCTUATION = /[\s.!?,;:।॥]+$/u;

/**
 * Canonical text form shared by utterances and trigger patterns: NFC,
 * lower-cased, whitespace collapsed, terminal punctuation removed.
 */
export function normalizeText(raw: string): string {
  return raw
    .normalize('NFC')
    .toLowerCase()
    .replace(/\s+/gu, ' ')
    .trim()
    .replace(TERMINAL_PUNCTUATION, '');
}

/**
 * Majority script wins; ties (including text with no letters at all) go to
 * English.
 */
export function detectLanguage(text: string): Language {
  let devanagari = 0;
  let gujarati = 0;
  let latin = 0;

  for (const char of text) {
    if (DEVANAGARI.test(char)) devanagari++;
    else if (GUJARATI.test(char)) gujarati++;
    else if (LATIN.test(char)) latin++;
  }

  if (devanagari > latin && devanagari > gujarati) return Language.HINDI;
  if (gujarati > latin && gujarati > devanagari) return Language.GUJARATI;
  return Language.ENGLISH;
}

@Injectable()
export class LanguageNormalizer {
  /**
   * The speech-to-text hint is only consulted for empty utterances, where
   * there is no script to inspect and the re-prompt still needs a language.
   */
  normalize(raw: string, languageHint?: string): NormalizedUtterance {
    const text = normalizeText(raw);
    if (!text) {
      return {
        kind: 'empty',
        language: isLanguage(languageHint) ? languageHint : Language.ENGLISH,
      };
    }
    return { kind: 'text', text, language: detectLanguage(text) };
  }
}
