import type { Response } from 'express';

/**
 * Aborts when the client goes away before the response finishes. Call
 * `dispose` once the handler is done with the signal.
 */
export interface RequestSignal {
  signal: AbortSignal;
  dispose: () => void;
}

export function createRequestSignal(res: Response): RequestSignal {
  const controller = new AbortController();
  const onClose = (): void => {
    if (!res.writableFinished) controller.abort();
  };
  res.once('close', onClose);

  return {
    signal: controller.signal,
    dispose: () => {
      res.off('close', onClose);
    },
  };
}
