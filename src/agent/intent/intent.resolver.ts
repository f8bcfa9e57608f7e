import { Inject, Injectable, Logger } from '@nestjs/common';
import { UnresolvableIntentError } from '../../common/errors';
import type { Language } from '../../language/language.types';
import {
  INTENT_PRIORITY_TIERS,
  IntentType,
  Resolution,
  TriggerMatch,
} from './intent.types';
import { TRIGGER_TABLE, TriggerTable } from './trigger-table';

@Injectable()
export class IntentResolver {
  private readonly logger = new Logger(IntentResolver.name);

  constructor(@Inject(TRIGGER_TABLE) private readonly table: TriggerTable) {}

  /**
   * Deterministic and side-effect free: the same (text, language) always
   * yields the same intent. Falls back to conversation when nothing matches.
   */
  resolve(text: string, language: Language): IntentType {
    return this.explain(text, language).intent;
  }

  /** Like `resolve`, but reports an utterance no pattern covers. */
  resolveStrict(text: string, language: Language): IntentType {
    const resolution = this.explain(text, language);
    if (resolution.matches.length === 0) {
      throw new UnresolvableIntentError(text);
    }
    return resolution.intent;
  }

  explain(text: string, language: Language): Resolution {
    const matches = this.table.match(text, language);
    const intent =
      matches.length > 0 ? this.prioritize(matches) : IntentType.CONVERSATION;

    this.logger.debug(
      `[${language}] "${text.slice(0, 60)}" → ${intent} (${matches.length} match${matches.length === 1 ? '' : 'es'})`,
    );

    return {
      intent,
      language,
      text,
      matches,
      winning: matches.filter((match) => match.intent === intent),
    };
  }

  /**
   * Highest tier with any hit wins; inside a tier the longest matched span,
   * then the tier's listed order.
   */
  private prioritize(matches: TriggerMatch[]): IntentType {
    for (const tier of INTENT_PRIORITY_TIERS) {
      let best: { intent: IntentType; span: number } | undefined;
      for (const intent of tier) {
        const span = Math.max(
          0,
          ...matches
            .filter((match) => match.intent === intent)
            .map((match) => match.matched.length),
        );
        if (span > 0 && (best === undefined || span > best.span)) {
          best = { intent, span };
        }
      }
      if (best) return best.intent;
    }
    return IntentType.CONVERSATION;
  }
}
