import { Inject, Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import {
  DesktopActionFailedError,
  isCollaboratorFailure,
  StaleContextReferencedError,
  throwIfCancelled,
} from '../../common/errors';
import { ExclusiveResource } from '../../common/exclusive-resource';
import {
  CAMERA,
  Camera,
  CONVERSATION_MODEL,
  ConversationModel,
  DESKTOP,
  Desktop,
  DesktopApp,
  KNOWLEDGE_LOOKUP,
  KnowledgeLookup,
  VISION_MODEL,
  VisionModel,
  WEB_SEARCH,
  WebSearch,
} from '../../collaborators/collaborator.ports';
import { ASSISTANT_CONFIG, AssistantConfig } from '../../config/assistant.config';
import {
  ASSISTANT_EVENTS,
  type ActionTriggeredEvent,
} from '../../events/assistant.events';
import type { Language } from '../../language/language.types';
import { ContextStore } from '../context/context.store';
import {
  ConversationTurn,
  SearchContext,
  SearchSource,
  TurnCommit,
} from '../context/context.types';
import {
  ExtractionResult,
  IntentType,
  MissingParameter,
  ParsedCommand,
  SlotName,
  VolumeDirection,
} from '../intent/intent.types';
import { TRIGGER_TABLE, TriggerTable } from '../intent/trigger-table';
import { conversationSystemPrompt } from './conversation-prompt';
import { renderResponse, ResponseKey } from './response-templates';

/** What a turn would say, do and write, before anything is committed. */
export interface DispatchOutcome {
  response: string;
  sideEffect?: string;
  commit?: TurnCommit;
}

export interface DispatchResult {
  response: string;
  sideEffect?: string;
  committed: boolean;
}

type Command = ParsedCommand | MissingParameter;

type DesktopIntent =
  | IntentType.OPEN_APP
  | IntentType.CLOSE_APP
  | IntentType.OPEN_WEBSITE
  | IntentType.SCREENSHOT
  | IntentType.SYSTEM_STATUS
  | IntentType.VOLUME_CONTROL;

const VOLUME_RESPONSES: Record<VolumeDirection, ResponseKey> = {
  up: 'volumeUp',
  down: 'volumeDown',
  mute: 'volumeMute',
};

function otherSource(source: SearchSource): SearchSource {
  return source === 'web' ? 'knowledge' : 'web';
}

@Injectable()
export class DispatcherService {
  private readonly logger = new Logger(DispatcherService.name);
  private readonly cameraLease = new ExclusiveResource('camera');

  constructor(
    @Inject(ASSISTANT_CONFIG) private readonly config: AssistantConfig,
    @Inject(TRIGGER_TABLE) private readonly table: TriggerTable,
    @Inject(CONVERSATION_MODEL)
    private readonly conversation: ConversationModel,
    @Inject(CAMERA) private readonly camera: Camera,
    @Inject(VISION_MODEL) private readonly vision: VisionModel,
    @Inject(KNOWLEDGE_LOOKUP) private readonly knowledge: KnowledgeLookup,
    @Inject(WEB_SEARCH) private readonly webSearch: WebSearch,
    @Inject(DESKTOP) private readonly desktop: Desktop,
    private readonly eventEmitter: EventEmitter2,
  ) {}

  /**
   * Runs the command and commits its outcome to the store. A turn that was
   * cancelled or whose collaborator failed leaves the store untouched.
   */
  async dispatch(
    command: ExtractionResult,
    store: ContextStore,
    signal?: AbortSignal,
  ): Promise<DispatchResult> {
    const outcome = await this.plan(command, store, signal);
    throwIfCancelled(signal);
    if (outcome.commit) store.commit(outcome.commit);
    return {
      response: outcome.response,
      sideEffect: outcome.sideEffect,
      committed: outcome.commit !== undefined,
    };
  }

  /** Response for an empty utterance; nothing is resolved or committed. */
  reprompt(language: Language): DispatchResult {
    return { response: renderResponse('reprompt', language), committed: false };
  }

  /** Performs the collaborator call for a command without writing the store. */
  async plan(
    command: ExtractionResult,
    store: ContextStore,
    signal?: AbortSignal,
  ): Promise<DispatchOutcome> {
    throwIfCancelled(signal);
    this.logger.debug(`Dispatching ${command.kind} ${command.intent}`);

    if (command.kind === 'missing') {
      return this.recover(command, store, signal);
    }

    const { intent, language } = command;
    const name = this.config.assistantNames[language];

    switch (intent) {
      case IntentType.EXIT:
        return this.reply(
          command,
          renderResponse('exit', language, { name }),
          'exit requested',
        );

      case IntentType.RESET: {
        const response = renderResponse('reset', language);
        return {
          response,
          sideEffect: 'context reset',
          commit: { turns: [], reset: true },
        };
      }

      case IntentType.IDENTITY:
        return this.reply(
          command,
          renderResponse('identity', language, { name }),
        );

      case IntentType.VISION:
        return this.see(command, store, signal);

      case IntentType.KNOWLEDGE:
      case IntentType.WEB_SEARCH: {
        const query = command.slots.query;
        if (!query) return this.clarify(command, 'query');
        return this.search(
          intent === IntentType.WEB_SEARCH ? 'web' : 'knowledge',
          command,
          query,
          signal,
        );
      }

      case IntentType.OPEN_APP:
      case IntentType.CLOSE_APP:
      case IntentType.OPEN_WEBSITE:
      case IntentType.SCREENSHOT:
      case IntentType.SYSTEM_STATUS:
      case IntentType.VOLUME_CONTROL:
        return this.act(command, intent);

      case IntentType.CONVERSATION:
      default:
        return this.converse(command, store, signal);
    }
  }

  // ── Missing parameters ──────────────────────────────────────────────────────

  private async recover(
    command: MissingParameter,
    store: ContextStore,
    signal?: AbortSignal,
  ): Promise<DispatchOutcome> {
    const [slot] = command.missing;
    const last = store.getSearchContext();
    if (slot === 'query' && last) {
      return this.continueSearch(command, last, signal);
    }
    return this.clarify(command, slot);
  }

  private clarify(
    command: Command,
    slot: SlotName | undefined,
  ): DispatchOutcome {
    const key = this.clarifyingQuestion(command.intent, slot);
    return this.reply(command, renderResponse(key, command.language));
  }

  private clarifyingQuestion(
    intent: IntentType,
    slot: SlotName | undefined,
  ): ResponseKey {
    switch (slot) {
      case 'app':
        return intent === IntentType.CLOSE_APP
          ? 'clarifyCloseApp'
          : 'clarifyOpenApp';
      case 'site':
        return 'clarifySite';
      case 'query':
        return 'clarifyQuery';
      case 'direction':
        return 'clarifyDirection';
      default:
        return 'reprompt';
    }
  }

  /** "Tell me more": the next web result for the previous query. */
  private async continueSearch(
    command: Command,
    last: SearchContext,
    signal?: AbortSignal,
  ): Promise<DispatchOutcome> {
    const { language } = command;
    try {
      const results = await this.webSearch.search(
        last.query,
        this.config.searchMaxResults,
        signal,
      );
      const next = results.find(
        (snippet) => snippet.trim().length > 0 && snippet !== last.snippet,
      );
      if (next === undefined) {
        return this.reply(
          command,
          renderResponse('noMore', language, { query: last.query }),
        );
      }
      return this.reply(command, next, `searched the web for "${last.query}"`, {
        search: { query: last.query, snippet: next, source: 'web' },
      });
    } catch (error) {
      if (!isCollaboratorFailure(error)) throw error;
      return this.failure(
        renderResponse('notFound', language, { query: last.query }),
        error,
      );
    }
  }

  // ── Conversation & vision ───────────────────────────────────────────────────

  private async converse(
    command: Command,
    store: ContextStore,
    signal?: AbortSignal,
    visualContext?: string,
  ): Promise<DispatchOutcome> {
    const { language, text } = command;
    try {
      const answer = await this.conversation.reply(
        {
          system: conversationSystemPrompt(
            language,
            this.config.assistantNames[language],
            visualContext,
          ),
          history: store
            .recentTurns(this.config.historyWindow)
            .map((turn) => ({ role: turn.speaker, content: turn.text })),
          prompt: text,
        },
        signal,
      );
      const reply = answer.trim();
      if (!reply) {
        return this.failure(renderResponse('conversationUnavailable', language));
      }
      return this.reply(
        command,
        reply,
        undefined,
        visualContext !== undefined ? { touchVision: true } : {},
      );
    } catch (error) {
      if (!isCollaboratorFailure(error)) throw error;
      return this.failure(
        renderResponse('conversationUnavailable', language),
        error,
      );
    }
  }

  private async see(
    command: ParsedCommand,
    store: ContextStore,
    signal?: AbortSignal,
  ): Promise<DispatchOutcome> {
    const { language, slots, text } = command;

    if (slots.followUp) {
      const context = store.getVisionContext();
      if (context) {
        return this.converse(command, store, signal, context.description);
      }
      if (store.hasExpiredVisionContext()) {
        this.logger.warn(new StaleContextReferencedError('vision').message);
        return this.reply(command, renderResponse('staleVision', language));
      }
    }

    try {
      const frame = await this.cameraLease.use(
        () => this.camera.capture(signal),
        signal,
      );
      const capturedAt = new Date().toISOString();
      const description = (
        await this.vision.describe(frame, slots.question ?? text, signal)
      ).trim();
      if (!description) {
        return this.failure(renderResponse('visionUnavailable', language));
      }
      return this.reply(
        command,
        renderResponse('visionPrefix', language, { description }),
        'captured camera frame',
        { vision: { description, capturedAt } },
      );
    } catch (error) {
      if (!isCollaboratorFailure(error)) throw error;
      return this.failure(renderResponse('visionUnavailable', language), error);
    }
  }

  // ── Search ──────────────────────────────────────────────────────────────────

  private async search(
    primary: SearchSource,
    command: Command,
    query: string,
    signal?: AbortSignal,
  ): Promise<DispatchOutcome> {
    const { language } = command;

    // One attempt on the primary back end, at most one on the other.
    for (const source of [primary, otherSource(primary)]) {
      try {
        const snippet = await this.searchOnce(source, query, language, signal);
        if (snippet !== undefined) {
          return this.reply(
            command,
            snippet,
            source === 'web'
              ? `searched the web for "${query}"`
              : `looked up "${query}"`,
            { search: { query, snippet, source } },
          );
        }
        this.logger.warn(`No ${source} result for "${query}"`);
      } catch (error) {
        if (!isCollaboratorFailure(error)) throw error;
        this.logger.warn(`${source} search failed: ${error.message}`);
      }
    }

    return this.failure(renderResponse('notFound', language, { query }));
  }

  private async searchOnce(
    source: SearchSource,
    query: string,
    language: Language,
    signal?: AbortSignal,
  ): Promise<string | undefined> {
    const snippet =
      source === 'knowledge'
        ? await this.knowledge.lookup(query, language, signal)
        : (
            await this.webSearch.search(
              query,
              this.config.searchMaxResults,
              signal,
            )
          ).find((result) => result.trim().length > 0);
    return snippet?.trim() || undefined;
  }

  // ── Desktop ─────────────────────────────────────────────────────────────────

  private async act(
    command: ParsedCommand,
    intent: DesktopIntent,
  ): Promise<DispatchOutcome> {
    const { language, slots } = command;
    try {
      switch (intent) {
        case IntentType.OPEN_APP: {
          if (!slots.app) return this.clarify(command, 'app');
          const app = this.desktopApp(slots.app);
          this.emitAction('open_app', { app: app.name });
          await this.desktop.openApp(app);
          return this.reply(
            command,
            renderResponse('openApp', language, { app: app.name }),
            `opened ${app.name}`,
          );
        }

        case IntentType.CLOSE_APP: {
          if (!slots.app) return this.clarify(command, 'app');
          const app = this.desktopApp(slots.app);
          this.emitAction('close_app', { app: app.name });
          await this.desktop.closeApp(app);
          return this.reply(
            command,
            renderResponse('closeApp', language, { app: app.name }),
            `closed ${app.name}`,
          );
        }

        case IntentType.OPEN_WEBSITE: {
          if (!slots.site) return this.clarify(command, 'site');
          const browser = this.desktopApp(
            slots.browser ?? this.config.defaultBrowser,
          );
          const url = /^https?:\/\//.test(slots.site)
            ? slots.site
            : `https://${slots.site}`;
          this.emitAction('open_website', { url, browser: browser.name });
          await this.desktop.openWebsite(url, browser);
          return this.reply(
            command,
            renderResponse('openWebsite', language, { site: slots.site }),
            `opened ${url} in ${browser.name}`,
          );
        }

        case IntentType.SCREENSHOT: {
          this.emitAction('screenshot', {});
          const path = await this.desktop.screenshot();
          return this.reply(
            command,
            renderResponse('screenshot', language, { path }),
            `screenshot saved to ${path}`,
          );
        }

        case IntentType.SYSTEM_STATUS: {
          const status = await this.desktop.systemStatus();
          const battery = status.battery
            ? renderResponse(
                status.battery.charging
                  ? 'batteryCharging'
                  : 'batteryDischarging',
                language,
                { percent: Math.round(status.battery.percent) },
              )
            : renderResponse('batteryUnknown', language);
          return this.reply(
            command,
            renderResponse('systemStatus', language, {
              cpu: Math.round(status.cpuPercent),
              memory: Math.round(status.memoryPercent),
              battery,
            }),
            'read system status',
          );
        }

        case IntentType.VOLUME_CONTROL: {
          if (!slots.direction) return this.clarify(command, 'direction');
          this.emitAction('volume', { direction: slots.direction });
          await this.desktop.setVolume(slots.direction);
          return this.reply(
            command,
            renderResponse(VOLUME_RESPONSES[slots.direction], language),
            `volume ${slots.direction}`,
          );
        }
      }
    } catch (error) {
      if (error instanceof DesktopActionFailedError) {
        return this.failure(error.reason, error);
      }
      throw error;
    }
  }

  private desktopApp(name: string): DesktopApp {
    const app = this.table.catalog.app(name);
    return app ?? { name, command: name, process: name };
  }

  private emitAction(action: string, params: Record<string, unknown>): void {
    this.eventEmitter.emit(ASSISTANT_EVENTS.ACTION_TRIGGERED, {
      action,
      params,
      triggeredAt: new Date().toISOString(),
    } satisfies ActionTriggeredEvent);
  }

  // ── Outcomes ────────────────────────────────────────────────────────────────

  private reply(
    command: Command,
    response: string,
    sideEffect?: string,
    extra: Omit<TurnCommit, 'turns'> = {},
  ): DispatchOutcome {
    const timestamp = new Date().toISOString();
    const { language, text } = command;
    const turns: ConversationTurn[] = [
      { speaker: 'user', text, language, timestamp },
      { speaker: 'assistant', text: response, language, timestamp },
    ];
    return { response, sideEffect, commit: { turns, ...extra } };
  }

  private failure(response: string, cause?: Error): DispatchOutcome {
    if (cause) this.logger.error(`Turn failed: ${cause.message}`, cause.stack);
    return { response };
  }
}
