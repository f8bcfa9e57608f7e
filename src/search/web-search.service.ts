import { Inject, Injectable, Logger } from '@nestjs/common';
import { Type } from 'class-transformer';
import { IsArray, IsOptional, IsString, ValidateNested } from 'class-validator';
import { callCollaborator, readJson } from '../common/collaborator-http';
import type { WebSearch } from '../collaborators/collaborator.ports';
import { ASSISTANT_CONFIG, AssistantConfig } from '../config/assistant.config';

export class RelatedTopicDto {
  @IsOptional()
  @IsString()
  Text?: string;

  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => RelatedTopicDto)
  Topics?: RelatedTopicDto[];
}

export class InstantAnswerDto {
  @IsOptional()
  @IsString()
  AbstractText?: string;

  @IsOptional()
  @IsString()
  Definition?: string;

  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => RelatedTopicDto)
  RelatedTopics?: RelatedTopicDto[];
}

/** Snippets in answer order: abstract, definition, then related topics. */
export function collectSnippets(answer: InstantAnswerDto): string[] {
  const topics = (answer.RelatedTopics ?? []).flatMap((topic) => [
    topic.Text,
    ...(topic.Topics ?? []).map((nested) => nested.Text),
  ]);
  const snippets = [answer.AbstractText, answer.Definition, ...topics]
    .map((snippet) => snippet?.trim() ?? '')
    .filter((snippet) => snippet.length > 0);
  return [...new Set(snippets)];
}

/** DuckDuckGo instant answers; no API key required. */
@Injectable()
export class WebSearchService implements WebSearch {
  private readonly logger = new Logger(WebSearchService.name);
  private readonly timeoutMs: number;

  constructor(@Inject(ASSISTANT_CONFIG) config: AssistantConfig) {
    this.timeoutMs = config.collaboratorTimeoutMs;
  }

  async search(
    query: string,
    maxResults: number,
    signal?: AbortSignal,
  ): Promise<string[]> {
    const params = new URLSearchParams({
      q: query,
      format: 'json',
      no_html: '1',
      skip_disambig: '1',
    });
    const url = `https://api.duckduckgo.com/?${params.toString()}`;
    this.logger.debug(`Web search: "${query}"`);

    const res = await callCollaborator(
      'web-search',
      url,
      { headers: { Accept: 'application/json' } },
      { timeoutMs: this.timeoutMs, signal },
    );
    const answer = await readJson('web-search', res, InstantAnswerDto);
    return collectSnippets(answer).slice(0, maxResults);
  }
}
