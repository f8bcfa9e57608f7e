import type { Language } from '../language/language.types';
import type {
  CommandSlots,
  ExtractionResult,
  IntentType,
  SlotName,
  TriggerMatch,
} from './intent/intent.types';

export interface TurnRequest {
  text: string;
  /** Language reported by speech-to-text; only used for re-prompts. */
  languageHint?: string;
  sessionId?: string; // auto-generated if not provided
}

export interface TurnResult {
  sessionId: string;
  language: Language;
  /** Absent for an empty utterance, which is re-prompted unresolved. */
  intent?: IntentType;
  slots: CommandSlots;
  missing?: SlotName[];
  response: string;
  sideEffect?: string;
  committed: boolean;
  exit: boolean;
}

export interface VoiceTurnResult extends TurnResult {
  transcript: string;
}

export type ResolveResult =
  | { kind: 'empty'; language: Language }
  | {
      kind: 'resolved';
      language: Language;
      text: string;
      intent: IntentType;
      matches: TriggerMatch[];
      extraction: ExtractionResult;
    };
