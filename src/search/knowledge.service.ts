import { Inject, Injectable, Logger } from '@nestjs/common';
import { IsOptional, IsString } from 'class-validator';
import { callCollaborator, readJson } from '../common/collaborator-http';
import type { KnowledgeLookup } from '../collaborators/collaborator.ports';
import { ASSISTANT_CONFIG, AssistantConfig } from '../config/assistant.config';
import type { Language } from '../language/language.types';

export class WikipediaSummaryDto {
  @IsOptional()
  @IsString()
  type?: string;

  @IsOptional()
  @IsString()
  title?: string;

  @IsOptional()
  @IsString()
  extract?: string;
}

const SUMMARY_SENTENCES = 4;
const USER_AGENT = 'trilingual-assistant/0.1';

/** Capitalizes each word the way article titles are written. */
export function toTitleCase(query: string): string {
  return query
    .trim()
    .split(/\s+/u)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
}

/** First `count` sentences; sentences end in `.`, `!`, `?` or `।`. */
export function firstSentences(text: string, count: number): string {
  return text
    .trim()
    .split(/(?<=[.!?।])\s+/u)
    .filter(Boolean)
    .slice(0, count)
    .join(' ');
}

/** Article summaries from the Wikipedia REST API in the utterance language. */
@Injectable()
export class KnowledgeService implements KnowledgeLookup {
  private readonly logger = new Logger(KnowledgeService.name);
  private readonly timeoutMs: number;

  constructor(@Inject(ASSISTANT_CONFIG) config: AssistantConfig) {
    this.timeoutMs = config.collaboratorTimeoutMs;
  }

  summaryUrl(query: string, language: Language): string {
    const title = toTitleCase(query).replace(/ /g, '_');
    return `https://${language}.wikipedia.org/api/rest_v1/page/summary/${encodeURIComponent(title)}`;
  }

  async lookup(
    query: string,
    language: Language,
    signal?: AbortSignal,
  ): Promise<string | undefined> {
    const url = this.summaryUrl(query, language);
    this.logger.debug(`Wikipedia lookup: ${url}`);

    const res = await callCollaborator(
      'knowledge-lookup',
      url,
      { headers: { 'User-Agent': USER_AGENT, Accept: 'application/json' } },
      { timeoutMs: this.timeoutMs, signal },
      [404],
    );
    if (res.status === 404) return undefined;

    const summary = await readJson('knowledge-lookup', res, WikipediaSummaryDto);
    if (summary.type === 'disambiguation' || !summary.extract?.trim()) {
      return undefined;
    }
    return firstSentences(summary.extract, SUMMARY_SENTENCES);
  }
}
