import { errorMessage } from '@/shared/bestEffort';
import { createLogger } from '@/shared/logging/logger';
import type { Runtime } from '@/runtime/bootstrap';

const FORCE_EXIT_MS = 10000;

export function registerShutdownHandlers(
  runtime: Pick<Runtime, 'stop'>,
  log = createLogger('Server'),
): void {
  let shuttingDown = false;

  const shutdown = async (signal: NodeJS.Signals) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    log.info('shutting down', { signal });

    // A stuck pactl or bus call must not keep the process alive.
    const forceExit = setTimeout(() => {
      log.warn('shutdown timed out; forcing exit');
      process.exit(1);
    }, FORCE_EXIT_MS);

    let exitCode = 0;
    try {
      await runtime.stop();
    } catch (error) {
      exitCode = 1;
      log.error('shutdown failed', { message: errorMessage(error) });
    }

    clearTimeout(forceExit);
    process.exit(exitCode);
  };

  process.on('SIGINT', (signal) => {
    void shutdown(signal);
  });
  process.on('SIGTERM', (signal) => {
    void shutdown(signal);
  });
}
