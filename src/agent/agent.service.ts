import { Inject, Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { v4 as uuidv4 } from 'uuid';
import { isCollaboratorFailure } from '../common/errors';
import {
  SPEECH_SYNTHESIS,
  SPEECH_TO_TEXT,
  SpeechSynthesis,
  SpeechToText,
} from '../collaborators/collaborator.ports';
import {
  ASSISTANT_EVENTS,
  type ContextResetEvent,
  type IntentResolvedEvent,
  type ParameterMissingEvent,
  type TurnCompletedEvent,
} from '../events/assistant.events';
import { LanguageNormalizer } from '../language/language.normalizer';
import { Language } from '../language/language.types';
import {
  ResolveResult,
  TurnRequest,
  TurnResult,
  VoiceTurnResult,
} from './agent.types';
import { ContextStore } from './context/context.store';
import { ContextStoreRegistry } from './context/context-store.registry';
import { IntentType } from './intent/intent.types';
import { IntentResolver } from './intent/intent.resolver';
import { ParameterExtractor } from './intent/parameter.extractor';
import { DispatcherService } from './router/dispatcher.service';
import { renderResponse } from './router/response-templates';

@Injectable()
export class AgentService {
  private readonly logger = new Logger(AgentService.name);

  constructor(
    private readonly normalizer: LanguageNormalizer,
    private readonly resolver: IntentResolver,
    private readonly extractor: ParameterExtractor,
    private readonly dispatcher: DispatcherService,
    private readonly sessions: ContextStoreRegistry,
    private readonly eventEmitter: EventEmitter2,
    @Inject(SPEECH_TO_TEXT) private readonly stt: SpeechToText,
    @Inject(SPEECH_SYNTHESIS) private readonly tts: SpeechSynthesis,
  ) {}

  /** Normalize, resolve and extract without dispatching anything. */
  resolve(raw: string): ResolveResult {
    const utterance = this.normalizer.normalize(raw);
    if (utterance.kind === 'empty') {
      return { kind: 'empty', language: utterance.language };
    }
    const { text, language } = utterance;
    const resolution = this.resolver.explain(text, language);
    return {
      kind: 'resolved',
      language,
      text,
      intent: resolution.intent,
      matches: resolution.matches,
      extraction: this.extractor.extract(resolution.intent, text, language),
    };
  }

  async processTurn(
    request: TurnRequest,
    signal?: AbortSignal,
  ): Promise<TurnResult> {
    const startedAt = Date.now();
    const sessionId = request.sessionId ?? uuidv4();
    const session = this.sessions.getOrCreate(sessionId);

    const result = await session.lease.use(
      () => this.runTurn(sessionId, session.store, request, signal),
      signal,
    );

    this.logger.log(
      `[${sessionId}] "${request.text.slice(0, 60)}" → ${result.intent ?? 'reprompt'} (${result.language})`,
    );
    this.eventEmitter.emit(ASSISTANT_EVENTS.TURN_COMPLETED, {
      sessionId,
      intent: result.intent,
      language: result.language,
      response: result.response,
      sideEffect: result.sideEffect,
      committed: result.committed,
      durationMs: Date.now() - startedAt,
    } satisfies TurnCompletedEvent);

    return result;
  }

  /**
   * Audio file → transcript → turn. The response is handed to speech
   * synthesis without waiting for playback.
   */
  async processVoice(
    audioPath: string,
    sessionId?: string,
    signal?: AbortSignal,
  ): Promise<VoiceTurnResult> {
    let transcript: { text: string; language?: string };
    try {
      transcript = await this.stt.transcribe(audioPath, signal);
    } catch (error) {
      if (!isCollaboratorFailure(error)) throw error;
      this.logger.error(`Transcription failed: ${error.message}`);
      return {
        sessionId: sessionId ?? uuidv4(),
        language: Language.ENGLISH,
        slots: {},
        response: renderResponse('conversationUnavailable', Language.ENGLISH),
        committed: false,
        exit: false,
        transcript: '',
      };
    }

    const result = await this.processTurn(
      { text: transcript.text, languageHint: transcript.language, sessionId },
      signal,
    );
    void this.tts
      .speak(result.response, result.language)
      .catch((error: unknown) =>
        this.logger.warn(
          `Speech synthesis failed: ${error instanceof Error ? error.message : String(error)}`,
        ),
      );
    return { ...result, transcript: transcript.text };
  }

  private async runTurn(
    sessionId: string,
    store: ContextStore,
    request: TurnRequest,
    signal?: AbortSignal,
  ): Promise<TurnResult> {
    const utterance = this.normalizer.normalize(
      request.text,
      request.languageHint,
    );
    if (utterance.kind === 'empty') {
      const { response, committed } = this.dispatcher.reprompt(
        utterance.language,
      );
      return {
        sessionId,
        language: utterance.language,
        slots: {},
        response,
        committed,
        exit: false,
      };
    }

    // Step 1: Resolve intent
    const { text, language } = utterance;
    const resolution = this.resolver.explain(text, language);
    this.eventEmitter.emit(ASSISTANT_EVENTS.INTENT_RESOLVED, {
      sessionId,
      text,
      language,
      intent: resolution.intent,
      matchCount: resolution.matches.length,
    } satisfies IntentResolvedEvent);

    // Step 2: Extract parameters
    const extraction = this.extractor.extract(resolution.intent, text, language);
    if (extraction.kind === 'missing') {
      this.eventEmitter.emit(ASSISTANT_EVENTS.PARAMETER_MISSING, {
        sessionId,
        intent: extraction.intent,
        missing: extraction.missing,
      } satisfies ParameterMissingEvent);
    }

    // Step 3: Dispatch and commit
    const dispatched = await this.dispatcher.dispatch(extraction, store, signal);
    if (resolution.intent === IntentType.RESET && dispatched.committed) {
      this.eventEmitter.emit(ASSISTANT_EVENTS.CONTEXT_RESET, {
        sessionId,
        resetAt: new Date().toISOString(),
      } satisfies ContextResetEvent);
    }

    return {
      sessionId,
      language,
      intent: resolution.intent,
      slots: extraction.slots,
      ...(extraction.kind === 'missing' ? { missing: extraction.missing } : {}),
      response: dispatched.response,
      sideEffect: dispatched.sideEffect,
      committed: dispatched.committed,
      exit: resolution.intent === IntentType.EXIT,
    };
  }
}
