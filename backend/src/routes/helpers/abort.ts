import type { Response } from 'express';

/**
 * Signal that fires when the client goes away before the response is complete.
 */
export function abortOnClientClose(res: Response): AbortSignal {
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableEnded) {
      controller.abort();
    }
  });
  return controller.signal;
}
