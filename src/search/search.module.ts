import { Module } from '@nestjs/common';
import {
  KNOWLEDGE_LOOKUP,
  WEB_SEARCH,
} from '../collaborators/collaborator.ports';
import { KnowledgeService } from './knowledge.service';
import { WebSearchService } from './web-search.service';

@Module({
  providers: [
    KnowledgeService,
    WebSearchService,
    { provide: KNOWLEDGE_LOOKUP, useExisting: KnowledgeService },
    { provide: WEB_SEARCH, useExisting: WebSearchService },
  ],
  exports: [KNOWLEDGE_LOOKUP, WEB_SEARCH],
})
export class SearchModule {}
