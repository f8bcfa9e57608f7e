import { Injectable, Logger } from '@nestjs/common';
import { OnEvent } from '@nestjs/event-emitter';
import {
  ASSISTANT_EVENTS,
  type ActionTriggeredEvent,
  type ContextResetEvent,
  type IntentResolvedEvent,
  type ParameterMissingEvent,
  type TurnCompletedEvent,
} from './assistant.events';

function excerpt(text: string): string {
  return `${text.slice(0, 60)}${text.length > 60 ? '…' : ''}`;
}

@Injectable()
export class AssistantEventsListener {
  private readonly logger = new Logger('AssistantEventsListener');

  @OnEvent(ASSISTANT_EVENTS.INTENT_RESOLVED)
  onIntentResolved(event: IntentResolvedEvent) {
    this.logger.debug(
      `[intent.resolved] session=${event.sessionId} lang=${event.language} intent=${event.intent} matches=${event.matchCount} text="${excerpt(event.text)}"`,
    );
  }

  @OnEvent(ASSISTANT_EVENTS.PARAMETER_MISSING)
  onParameterMissing(event: ParameterMissingEvent) {
    this.logger.log(
      `[parameter.missing] session=${event.sessionId} intent=${event.intent} missing=${event.missing.join(',')}`,
    );
  }

  @OnEvent(ASSISTANT_EVENTS.ACTION_TRIGGERED)
  onActionTriggered(event: ActionTriggeredEvent) {
    this.logger.log(
      `[action.triggered] action=${event.action} params=${JSON.stringify(event.params)}`,
    );
  }

  @OnEvent(ASSISTANT_EVENTS.CONTEXT_RESET)
  onContextReset(event: ContextResetEvent) {
    this.logger.log(
      `[context.reset] session=${event.sessionId ?? '*'} at=${event.resetAt}`,
    );
  }

  @OnEvent(ASSISTANT_EVENTS.TURN_COMPLETED)
  onTurnCompleted(event: TurnCompletedEvent) {
    this.logger.log(
      `[turn.completed] session=${event.sessionId} intent=${event.intent ?? 'none'} committed=${event.committed} ${event.durationMs}ms${event.sideEffect ? ` effect="${event.sideEffect}"` : ''}`,
    );
  }
}
