import type { VolumeDirection } from '../agent/intent/intent.types';
import type { Language } from '../language/language.types';

export const SPEECH_TO_TEXT = Symbol('SPEECH_TO_TEXT');
export const CONVERSATION_MODEL = Symbol('CONVERSATION_MODEL');
export const CAMERA = Symbol('CAMERA');
export const VISION_MODEL = Symbol('VISION_MODEL');
export const KNOWLEDGE_LOOKUP = Symbol('KNOWLEDGE_LOOKUP');
export const WEB_SEARCH = Symbol('WEB_SEARCH');
export const DESKTOP = Symbol('DESKTOP');
export const SPEECH_SYNTHESIS = Symbol('SPEECH_SYNTHESIS');

export interface Transcript {
  text: string;
  /** As reported by the recognizer; unreliable. */
  language?: string;
}

export interface SpeechToText {
  transcribe(audioPath: string, signal?: AbortSignal): Promise<Transcript>;
}

export interface ChatMessage {
  role: 'user' | 'assistant';
  content: string;
}

export interface ConversationRequest {
  system: string;
  history: ChatMessage[];
  prompt: string;
}

export interface ConversationModel {
  reply(request: ConversationRequest, signal?: AbortSignal): Promise<string>;
}

export interface Camera {
  /** One JPEG frame. */
  capture(signal?: AbortSignal): Promise<Buffer>;
}

export interface VisionModel {
  describe(frame: Buffer, question: string, signal?: AbortSignal): Promise<string>;
}

export interface KnowledgeLookup {
  /** A short summary, or undefined when nothing is known about the query. */
  lookup(
    query: string,
    language: Language,
    signal?: AbortSignal,
  ): Promise<string | undefined>;
}

export interface WebSearch {
  /** Result snippets, best first. */
  search(
    query: string,
    maxResults: number,
    signal?: AbortSignal,
  ): Promise<string[]>;
}

export interface DesktopApp {
  name: string;
  command: string;
  process: string;
}

export interface SystemStatus {
  cpuPercent: number;
  memoryPercent: number;
  battery?: { percent: number; charging: boolean };
}

/**
 * OS-level actions. Failures the user should hear about are raised as
 * `DesktopActionFailedError` carrying a human-readable reason.
 */
export interface Desktop {
  openApp(app: DesktopApp): Promise<void>;
  closeApp(app: DesktopApp): Promise<void>;
  openWebsite(url: string, browser: DesktopApp): Promise<void>;
  /** Returns the path the screenshot was written to. */
  screenshot(): Promise<string>;
  systemStatus(): Promise<SystemStatus>;
  setVolume(direction: VolumeDirection): Promise<void>;
}

export interface SpeechSynthesis {
  speak(text: string, language: Language): Promise<void>;
}
