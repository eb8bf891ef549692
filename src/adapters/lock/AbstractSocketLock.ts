import net from 'node:net';
import type { InstanceLockPort } from '@/ports/InstanceLockPort';
import { createLogger } from '@/shared/logging/logger';

/**
 * Single-instance lock on a Linux abstract socket. The kernel drops the
 * address when the process exits, so a crash never leaves a stale lock.
 */
export class AbstractSocketLock implements InstanceLockPort {
  private readonly log = createLogger('Runtime', 'InstanceLock');
  private server?: net.Server;

  constructor(private readonly name: string) {}

  public async acquire(): Promise<boolean> {
    if (this.server) {
      return true;
    }
    const server = net.createServer((socket) => socket.destroy());
    const acquired = await new Promise<boolean>((resolve, reject) => {
      server.once('error', (error: NodeJS.ErrnoException) => {
        if (error.code === 'EADDRINUSE') {
          resolve(false);
          return;
        }
        reject(error);
      });
      server.listen(`\0${this.name}`, () => resolve(true));
    });
    if (acquired) {
      this.server = server;
      this.log.debug('instance lock acquired', { name: this.name });
    }
    return acquired;
  }

  public async release(): Promise<void> {
    if (!this.server) {
      return;
    }
    const server = this.server;
    this.server = undefined;
    await new Promise<void>((resolve) => server.close(() => resolve()));
  }
}
