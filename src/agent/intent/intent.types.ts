import type { Language } from '../../language/language.types';

export enum IntentType {
  // Default domain
  CONVERSATION = 'conversation',

  // Lookup
  KNOWLEDGE = 'knowledge',
  WEB_SEARCH = 'web_search',

  // Camera
  VISION = 'vision',

  // Desktop
  OPEN_APP = 'open_app',
  CLOSE_APP = 'close_app',
  OPEN_WEBSITE = 'open_website',
  SCREENSHOT = 'screenshot',
  SYSTEM_STATUS = 'system_status',
  VOLUME_CONTROL = 'volume_control',

  // Control
  IDENTITY = 'identity',
  RESET = 'reset',
  EXIT = 'exit',
}

export const INTENT_TYPES: readonly IntentType[] = Object.values(IntentType);

/**
 * Most specific first. Within a tier the longest matched span wins, then the
 * order listed here.
 */
export const INTENT_PRIORITY_TIERS: readonly (readonly IntentType[])[] = [
  [IntentType.EXIT, IntentType.RESET, IntentType.IDENTITY],
  [IntentType.VISION],
  [IntentType.OPEN_WEBSITE],
  [IntentType.OPEN_APP, IntentType.CLOSE_APP],
  [IntentType.SCREENSHOT, IntentType.SYSTEM_STATUS, IntentType.VOLUME_CONTROL],
  [IntentType.WEB_SEARCH, IntentType.KNOWLEDGE],
  [IntentType.CONVERSATION],
];

export type VolumeDirection = 'up' | 'down' | 'mute';

export interface CommandSlots {
  app?: string;
  site?: string;
  browser?: string;
  direction?: VolumeDirection;
  query?: string;
  /** Question handed to the vision model. */
  question?: string;
  /** Vision utterance that refers back to the last description ("what color is it"). */
  followUp?: boolean;
}

export type SlotName = keyof CommandSlots;

export interface ParsedCommand {
  kind: 'parsed';
  intent: IntentType;
  language: Language;
  text: string;
  slots: CommandSlots;
}

export interface MissingParameter {
  kind: 'missing';
  intent: IntentType;
  language: Language;
  text: string;
  missing: SlotName[];
  /** Slots that could be extracted before the gap was found. */
  slots: CommandSlots;
}

export type ExtractionResult = ParsedCommand | MissingParameter;

/** A single pattern hit reported by the resolver. */
export interface TriggerMatch {
  intent: IntentType;
  pattern: string;
  matched: string;
  index: number;
  /** Retained triggers are topic words; they stay in an extracted search query. */
  retain: boolean;
  /** The pattern explicitly asks for the camera. */
  capture: boolean;
  entities: Partial<Record<EntityKind, string>>;
}

export type EntityKind = 'app' | 'website' | 'browser';

export interface Resolution {
  intent: IntentType;
  language: Language;
  text: string;
  /** Every hit across all intents, in table order. */
  matches: TriggerMatch[];
  /** Hits belonging to the winning intent; empty for the conversation fallback. */
  winning: TriggerMatch[];
}
