import { Language, Localized } from '../../language/language.types';
import responsesJson from './responses.json';

export type ResponseKey = keyof typeof responsesJson.en;
export type TemplateParams = Record<string, string | number>;

// Every language must carry every key the English table has.
const TEMPLATES: Localized<Record<ResponseKey, string>> = {
  [Language.ENGLISH]: responsesJson.en,
  [Language.HINDI]: responsesJson.hi,
  [Language.GUJARATI]: responsesJson.gu,
};

/**
 * Renders a localized response. `{name}` style placeholders without a
 * matching parameter are left in place.
 */
export function renderResponse(
  key: ResponseKey,
  language: Language,
  params: TemplateParams = {},
): string {
  return TEMPLATES[language][key].replace(
    /\{(\w+)\}/g,
    (placeholder: string, name: string) =>
      name in params ? String(params[name]) : placeholder,
  );
}
