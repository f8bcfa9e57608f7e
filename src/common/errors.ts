export type CollaboratorName =
  | 'speech-to-text'
  | 'conversation-model'
  | 'vision-model'
  | 'camera'
  | 'knowledge-lookup'
  | 'web-search'
  | 'desktop'
  | 'speech-synthesis';

export abstract class AssistantError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Only raised by `IntentResolver.resolveStrict`; the normal path falls back to conversation. */
export class UnresolvableIntentError extends AssistantError {
  readonly code = 'UNRESOLVABLE_INTENT';

  constructor(readonly text: string) {
    super(`No trigger pattern matched "${text}"`);
  }
}

export class CollaboratorUnavailableError extends AssistantError {
  readonly code = 'COLLABORATOR_UNAVAILABLE';

  constructor(
    readonly collaborator: CollaboratorName,
    options?: { cause?: unknown },
  ) {
    super(`${collaborator} is unavailable`, options);
  }
}

export class CollaboratorTimeoutError extends AssistantError {
  readonly code = 'COLLABORATOR_TIMEOUT';

  constructor(
    readonly collaborator: CollaboratorName,
    readonly timeoutMs?: number,
  ) {
    super(
      `${collaborator} timed out${timeoutMs !== undefined ? ` after ${timeoutMs}ms` : ''}`,
    );
  }
}

export class DesktopActionFailedError extends AssistantError {
  readonly code = 'DESKTOP_ACTION_FAILED';

  constructor(readonly reason: string) {
    super(reason);
  }
}

export class StaleContextReferencedError extends AssistantError {
  readonly code = 'STALE_CONTEXT_REFERENCED';

  constructor(readonly context: 'vision' | 'search') {
    super(`Referenced ${context} context has expired`);
  }
}

export class TurnCancelledError extends AssistantError {
  readonly code = 'TURN_CANCELLED';

  constructor() {
    super('Turn was cancelled');
  }
}

export class TriggerTableError extends AssistantError {
  readonly code = 'TRIGGER_TABLE_INVALID';

  constructor(readonly problems: string[]) {
    super(`Invalid trigger table:\n- ${problems.join('\n- ')}`);
  }
}

export function isTimeoutError(error: unknown): boolean {
  return (
    error instanceof Error &&
    (error.name === 'TimeoutError' || error.name === 'AbortError')
  );
}

export function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) throw new TurnCancelledError();
}

/** Failures a turn recovers from with a spoken fallback. */
export function isCollaboratorFailure(
  error: unknown,
): error is CollaboratorUnavailableError | CollaboratorTimeoutError {
  return (
    error instanceof CollaboratorUnavailableError ||
    error instanceof CollaboratorTimeoutError
  );
}
