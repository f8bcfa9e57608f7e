import type { Language } from '../../language/language.types';

export type Speaker = 'user' | 'assistant';

export interface ConversationTurn {
  speaker: Speaker;
  text: string;
  language: Language;
  timestamp: string; // ISO 8601
}

export interface VisionContext {
  description: string;
  capturedAt: string; // ISO 8601
  /** Committed turn that produced or last referenced the description. */
  turnIndex: number;
}

export type SearchSource = 'knowledge' | 'web';

export interface SearchContext {
  query: string;
  snippet: string;
  source: SearchSource;
}

/**
 * Everything one turn writes, applied in a single step by
 * `ContextStore.commit`. A failed turn produces no commit at all.
 */
export interface TurnCommit {
  turns: ConversationTurn[];
  /** Clears all three stores before anything else is applied. */
  reset?: boolean;
  vision?: { description: string; capturedAt: string };
  /** A follow-up answered from the stored description keeps it alive. */
  touchVision?: boolean;
  search?: SearchContext;
}

export interface ContextStoreOptions {
  historyCapacity: number;
  visionStaleAfterTurns: number;
}
