export const ASSISTANT_EVENTS = {
  INTENT_RESOLVED: 'intent.resolved',
  PARAMETER_MISSING: 'parameter.missing',
  ACTION_TRIGGERED: 'action.triggered',
  CONTEXT_RESET: 'context.reset',
  TURN_COMPLETED: 'turn.completed',
} as const;

export type AssistantEventName =
  (typeof ASSISTANT_EVENTS)[keyof typeof ASSISTANT_EVENTS];

// ── Turn pipeline ─────────────────────────────────────────────────────────────

export interface IntentResolvedEvent {
  sessionId: string;
  text: string;
  language: string;
  intent: string; // IntentType value (e.g. 'open_app', 'vision', ...)
  matchCount: number;
}

export interface ParameterMissingEvent {
  sessionId: string;
  intent: string;
  missing: string[];
}

export interface TurnCompletedEvent {
  sessionId: string;
  intent?: string;
  language: string;
  response: string;
  sideEffect?: string;
  committed: boolean;
  durationMs: number;
}

// ── Context & actions ─────────────────────────────────────────────────────────

export interface ContextResetEvent {
  sessionId?: string;
  resetAt: string;
}

export interface ActionTriggeredEvent {
  action: string;
  params: Record<string, unknown>;
  triggeredAt: string;
}
