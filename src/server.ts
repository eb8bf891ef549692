import { loadConfig } from '@/config';
import { createLogger } from '@/shared/logging/logger';
import { errorMessage } from '@/shared/bestEffort';
import { createRuntime } from '@/runtime/bootstrap';
import { registerShutdownHandlers } from '@/runtime/shutdown';

const runtime = createRuntime(loadConfig());

runtime
  .start()
  .then((result) => {
    if (result === 'already-running') {
      createLogger('Server').info('another instance is already running; exiting');
      return;
    }
    registerShutdownHandlers(runtime);
  })
  .catch((error: unknown) => {
    const log = createLogger('Server');
    log.error('fatal bootstrap error', { message: errorMessage(error) });
    process.exit(1);
  });
