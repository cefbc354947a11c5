export class RequestDeadlineError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`Request did not finish within ${timeoutMs}ms`);
    this.name = 'RequestDeadlineError';
    Object.setPrototypeOf(this, RequestDeadlineError.prototype);
  }
}

export class ClientClosedRequestError extends Error {
  constructor() {
    super('Client closed the request');
    this.name = 'ClientClosedRequestError';
    Object.setPrototypeOf(this, ClientClosedRequestError.prototype);
  }
}

/**
 * The part of the HTTP response needed to notice a client going away.
 */
export interface ResponseLifecycle {
  readonly writableEnded: boolean;
  once(event: 'close', listener: () => void): unknown;
  removeListener(event: 'close', listener: () => void): unknown;
}

export interface RequestScope {
  signal: AbortSignal;
  release(): void;
}

/**
 * Signal that aborts when the deadline passes or the client disconnects
 * before the response is written. Call `release` once the handler is done.
 */
export function requestScope(response: ResponseLifecycle, timeoutMs: number): RequestScope {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(new RequestDeadlineError(timeoutMs)), timeoutMs);
  const onClose = (): void => {
    if (!response.writableEnded) {
      controller.abort(new ClientClosedRequestError());
    }
  };
  response.once('close', onClose);

  return {
    signal: controller.signal,
    release: () => {
      clearTimeout(timer);
      response.removeListener('close', onClose);
    },
  };
}
