import { errorMessage } from '@/shared/bestEffort';
import { createLogger, type ComponentLogger } from '@/shared/logging/logger';

export type StopResult =
  | { kind: 'stopped' }
  | { kind: 'timeout' }
  | { kind: 'error'; error: unknown };

export type StopLogger = Pick<ComponentLogger, 'info' | 'warn' | 'error'>;

/**
 * Runs one shutdown step with a deadline. A step that overruns keeps running;
 * a late failure is still logged.
 */
export async function stopWithTimeout(
  name: string,
  stopFn: () => Promise<void>,
  timeoutMs: number,
  log: StopLogger = createLogger('Server'),
): Promise<StopResult> {
  let timeoutHandle: NodeJS.Timeout | null = null;
  const stopPromise = (async (): Promise<StopResult> => {
    try {
      await stopFn();
      return { kind: 'stopped' };
    } catch (error) {
      return { kind: 'error', error };
    }
  })();
  const timeoutPromise = new Promise<StopResult>((resolve) => {
    timeoutHandle = setTimeout(() => resolve({ kind: 'timeout' }), timeoutMs);
  });

  const result = await Promise.race([stopPromise, timeoutPromise]).finally(() => {
    if (timeoutHandle) {
      clearTimeout(timeoutHandle);
    }
  });

  switch (result.kind) {
    case 'stopped':
      log.info(`${name} stopped`);
      return result;
    case 'timeout':
      log.warn(`${name} stop timed out`, { timeoutMs });
      void stopPromise.then((late) => {
        if (late.kind === 'error') {
          log.error(`failed to stop ${name}`, { message: errorMessage(late.error) });
        }
      });
      return result;
    case 'error':
      log.error(`failed to stop ${name}`, { message: errorMessage(result.error) });
      return result;
  }
}
