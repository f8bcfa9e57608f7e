import { Inject, Injectable } from '@nestjs/common';
import type { Language } from '../../language/language.types';
import {
  CommandSlots,
  ExtractionResult,
  IntentType,
  SlotName,
  TriggerMatch,
  VolumeDirection,
} from './intent.types';
import { LanguageLexicon, TRIGGER_TABLE, TriggerTable } from './trigger-table';
import { VISION_QUESTIONS, VisionQuestionBuilder } from './vision-question';

const VOLUME_DIRECTIONS: readonly VolumeDirection[] = ['mute', 'up', 'down'];

/**
 * Slot extraction per intent. Never throws: a required slot that cannot be
 * filled comes back as a `missing` result for the dispatcher to recover.
 */
@Injectable()
export class ParameterExtractor {
  constructor(
    @Inject(TRIGGER_TABLE) private readonly table: TriggerTable,
    @Inject(VISION_QUESTIONS) private readonly questions: VisionQuestionBuilder,
  ) {}

  extract(
    intent: IntentType,
    text: string,
    language: Language,
  ): ExtractionResult {
    const lexicon = this.table.lexicon(language);
    const matches = this.table.match(text, language, intent);

    const complete = (slots: CommandSlots): ExtractionResult => ({
      kind: 'parsed',
      intent,
      language,
      text,
      slots,
    });
    const missing = (
      names: SlotName[],
      slots: CommandSlots = {},
    ): ExtractionResult => ({
      kind: 'missing',
      intent,
      language,
      text,
      missing: names,
      slots,
    });

    switch (intent) {
      case IntentType.OPEN_WEBSITE: {
        const suffix = this.browserSuffix(text, lexicon);
        const site =
          this.captured('website', matches) ??
          this.table.catalog.findFirst('website', text, { to: suffix.start });
        const slots: CommandSlots = suffix.browser
          ? { browser: suffix.browser }
          : {};
        return site ? complete({ site, ...slots }) : missing(['site'], slots);
      }

      case IntentType.OPEN_APP:
      case IntentType.CLOSE_APP: {
        const suffix = this.browserSuffix(text, lexicon);
        const app =
          this.captured('app', matches) ??
          this.table.catalog.findFirst('app', text, { to: suffix.start });
        return app ? complete({ app }) : missing(['app']);
      }

      case IntentType.VOLUME_CONTROL: {
        const found = VOLUME_DIRECTIONS.filter((direction) =>
          lexicon.volume[direction].some((keyword) => keyword.test(text)),
        );
        return found.length === 1
          ? complete({ direction: found[0] })
          : missing(['direction']);
      }

      case IntentType.WEB_SEARCH:
      case IntentType.KNOWLEDGE: {
        const query = this.stripTriggers(text, matches, lexicon);
        return query ? complete({ query }) : missing(['query']);
      }

      case IntentType.VISION: {
        const question = this.questions.build(text, lexicon.questionWords);
        const explicitCapture = matches.some((match) => match.capture);
        const refersBack =
          !explicitCapture &&
          lexicon.references.some((reference) => reference.test(text));
        return complete(
          refersBack ? { question, followUp: true } : { question },
        );
      }

      default:
        return complete({});
    }
  }

  private captured(
    kind: 'app' | 'website',
    matches: TriggerMatch[],
  ): string | undefined {
    for (const match of matches) {
      const alias = match.entities[kind];
      const canonical =
        alias !== undefined ? this.table.catalog.canonical(kind, alias) : undefined;
      if (canonical) return canonical;
    }
    return undefined;
  }

  /** Earliest "in <browser>" style suffix; `start` bounds the target search. */
  private browserSuffix(
    text: string,
    lexicon: LanguageLexicon,
  ): { browser?: string; start: number } {
    let best: { browser?: string; start: number } = { start: text.length };
    for (const suffix of lexicon.browserSuffixes) {
      const hit = suffix.exec(text);
      const alias = hit?.groups?.browser;
      if (!hit || alias === undefined || hit.index >= best.start) continue;
      best = {
        browser: this.table.catalog.canonical('browser', alias),
        start: hit.index,
      };
    }
    return best;
  }

  /**
   * The text minus every non-retained trigger span of the intent, with
   * filler words trimmed from both edges.
   */
  private stripTriggers(
    text: string,
    matches: TriggerMatch[],
    lexicon: LanguageLexicon,
  ): string {
    const removed = new Array<boolean>(text.length).fill(false);
    for (const match of matches) {
      if (match.retain) continue;
      removed.fill(true, match.index, match.index + match.matched.length);
    }

    const words = text
      .split('')
      .map((char, i) => (removed[i] ? ' ' : char))
      .join('')
      .split(/\s+/u)
      .filter(Boolean);

    while (words.length > 0 && lexicon.fillers.has(words[0])) words.shift();
    while (words.length > 0 && lexicon.fillers.has(words[words.length - 1])) {
      words.pop();
    }
    return words.join(' ');
  }
}
