/** The part of an HTTP response needed to notice a client that went away. */
export interface ClosableResponse {
  readonly writableFinished: boolean;
  once(event: 'close', listener: () => void): unknown;
}

/**
 * Signal that aborts when the connection closes before the response was
 * written, i.e. the client hung up mid-turn.
 */
export function abortOnDisconnect(res: ClosableResponse): AbortSignal {
  const controller = new AbortController();
  res.once('close', () => {
    if (!res.writableFinished) controller.abort();
  });
  return controller.signal;
}
