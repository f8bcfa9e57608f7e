import type { ClassConstructor } from 'class-transformer';
import {
  CollaboratorName,
  CollaboratorTimeoutError,
  CollaboratorUnavailableError,
  isTimeoutError,
  TurnCancelledError,
} from './errors';
import { validatePlain } from './validate-plain';

export interface CollaboratorRequestOptions {
  timeoutMs: number;
  /** Caller cancellation; distinct from the collaborator timeout. */
  signal?: AbortSignal;
}

/**
 * `fetch` with a collaborator timeout. Network failures and non-2xx answers
 * become `CollaboratorUnavailableError`, an elapsed timeout becomes
 * `CollaboratorTimeoutError` and a caller abort becomes `TurnCancelledError`.
 * Statuses listed in `accept` are returned to the caller untouched.
 */
export async function callCollaborator(
  collaborator: CollaboratorName,
  url: string,
  init: RequestInit,
  options: CollaboratorRequestOptions,
  accept: number[] = [],
): Promise<Response> {
  const timeout = AbortSignal.timeout(options.timeoutMs);
  const signal = options.signal
    ? AbortSignal.any([options.signal, timeout])
    : timeout;

  let res: Response;
  try {
    res = await fetch(url, { ...init, signal });
  } catch (error) {
    if (options.signal?.aborted) throw new TurnCancelledError();
    if (timeout.aborted || isTimeoutError(error)) {
      throw new CollaboratorTimeoutError(collaborator, options.timeoutMs);
    }
    throw new CollaboratorUnavailableError(collaborator, { cause: error });
  }

  if (!res.ok && !accept.includes(res.status)) {
    const body = await res.text().catch(() => '');
    throw new CollaboratorUnavailableError(collaborator, {
      cause: new Error(`HTTP ${res.status}: ${body.slice(0, 200)}`),
    });
  }
  return res;
}

/** Parses and validates a JSON body against a class-validator DTO. */
export async function readJson<T extends object>(
  collaborator: CollaboratorName,
  res: Response,
  cls: ClassConstructor<T>,
): Promise<T> {
  let body: unknown;
  try {
    body = await res.json();
  } catch (error) {
    throw new CollaboratorUnavailableError(collaborator, { cause: error });
  }
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    throw new CollaboratorUnavailableError(collaborator, {
      cause: new Error('Response body is not a JSON object'),
    });
  }

  const { value, problems } = validatePlain(cls, body);
  if (problems.length > 0) {
    throw new CollaboratorUnavailableError(collaborator, {
      cause: new Error(`Unexpected response: ${problems.join('; ')}`),
    });
  }
  return value;
}
