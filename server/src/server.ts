import { buildApp } from './app.js';
import { SHUTDOWN_SIGNALS, createShutdown } from './lifecycle.js';

async function start(): Promise<void> {
  const app = await buildApp();
  const shutdown = createShutdown(app);

  // Container runtimes stop PID 1 with SIGTERM
  for (const signal of SHUTDOWN_SIGNALS) {
    process.once(signal, () => {
      void shutdown(signal).then((code) => process.exit(code));
    });
  }

  const { host, port } = app.config;
  await app.listen({ host, port });
  app.log.info({ host, port }, 'Studio ledger ready');
}

start().catch((err: unknown) => {
  console.error('Studio ledger failed to start:', err);
  process.exit(1);
});
