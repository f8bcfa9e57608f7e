import { TriggerTableError } from '../../common/errors';
import { validatePlain } from '../../common/validate-plain';
import { phraseRegex } from './trigger-table';
import { VisionQuestionsFileDto } from './trigger-rules.schema';
import visionQuestionsJson from './vision-questions.json';

export const VISION_QUESTIONS = Symbol('VISION_QUESTIONS');

interface QuestionRule {
  keywords: RegExp[];
  question: string;
}

/**
 * Picks the question the vision model is asked for an utterance. The model
 * only understands English, so every question is English regardless of the
 * utterance language. Keywords match whole words; first hit wins.
 */
export class VisionQuestionBuilder {
  private constructor(
    private readonly rules: readonly QuestionRule[],
    private readonly answerPrefix: string,
    private readonly fallback: string,
  ) {}

  static fromPlain(plain: object): VisionQuestionBuilder {
    const { value, problems } = validatePlain(VisionQuestionsFileDto, plain);
    if (problems.length > 0) throw new TriggerTableError(problems);
    return new VisionQuestionBuilder(
      value.rules.map((rule) => ({
        keywords: rule.keywords.map((keyword) => phraseRegex(keyword)),
        question: rule.question,
      })),
      value.answerPrefix,
      value.fallback,
    );
  }

  static loadDefault(): VisionQuestionBuilder {
    return VisionQuestionBuilder.fromPlain(visionQuestionsJson);
  }

  build(text: string, questionWords: readonly string[]): string {
    const rule = this.rules.find((candidate) =>
      candidate.keywords.some((keyword) => keyword.test(text)),
    );
    if (rule) return rule.question;

    if (questionWords.some((word) => text.startsWith(word))) {
      return `${this.answerPrefix}${text}`;
    }
    return this.fallback;
  }
}
