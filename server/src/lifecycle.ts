import type { FastifyInstance } from 'fastify';

export const SHUTDOWN_SIGNALS = ['SIGTERM', 'SIGINT'] as const;
export type ShutdownSignal = (typeof SHUTDOWN_SIGNALS)[number];

/**
 * Returns a handler that closes `app` once, however many signals arrive.
 * Every call resolves to the process exit code for the same close.
 */
export function createShutdown(
  app: FastifyInstance,
): (signal: ShutdownSignal) => Promise<number> {
  let closing: Promise<number> | undefined;

  return (signal) => {
    if (!closing) {
      app.log.info({ signal }, 'Shutting down');
      closing = app.close().then(
        () => 0,
        (err: unknown) => {
          app.log.error({ err }, 'Error during shutdown');
          return 1;
        },
      );
    }
    return closing;
  };
}
