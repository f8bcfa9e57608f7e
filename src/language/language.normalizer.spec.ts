import {
  detectLanguage,
  LanguageNormalizer,
  normalizeText,
} from './language.normalizer';
import { isLanguage, Language } from './language.types';

describe('normalizeText', () => {
  it('lower-cases, collapses whitespace and drops terminal punctuation', () => {
    expect(normalizeText('  Open   YouTube!! ')).toBe('open youtube');
  });

  it('keeps punctuation inside the utterance', () => {
    expect(normalizeText('Search for node.js, please?')).toBe(
      'search for node.js, please',
    );
  });

  it('strips the danda', () => {
    expect(normalizeText('घड़ी में क्या समय है।')).toBe('घड़ी में क्या समय है');
  });
});

describe('detectLanguage', () => {
  it.each<[string, Language]>([
    ['what do you see', Language.ENGLISH],
    ['घड़ी में क्या समय है', Language.HINDI],
    ['તમે શું જુઓ છો', Language.GUJARATI],
    ['ok कख', Language.ENGLISH],
    ['12345', Language.ENGLISH],
  ])('%s → %s', (text, language) => {
    expect(detectLanguage(text)).toBe(language);
  });
});

describe('LanguageNormalizer', () => {
  const normalizer = new LanguageNormalizer();

  it('returns normalized text with the detected language', () => {
    expect(normalizer.normalize('What do you SEE?', 'hi')).toEqual({
      kind: 'text',
      text: 'what do you see',
      language: Language.ENGLISH,
    });
  });

  it('uses the hint for an empty utterance', () => {
    expect(normalizer.normalize('   ', 'gu')).toEqual({
      kind: 'empty',
      language: Language.GUJARATI,
    });
  });

  it('falls back to English for an unknown hint', () => {
    expect(normalizer.normalize('?!', 'fr')).toEqual({
      kind: 'empty',
      language: Language.ENGLISH,
    });
  });
});

describe('isLanguage', () => {
  it('accepts only supported codes', () => {
    expect(isLanguage('hi')).toBe(true);
    expect(isLanguage('fr')).toBe(false);
    expect(isLanguage(undefined)).toBe(false);
  });
});
