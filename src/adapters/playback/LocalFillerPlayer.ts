import { spawn } from 'node:child_process';
import path from 'node:path';
import { parseFile } from 'music-metadata';
import type { ClockPort } from '@/ports/ClockPort';
import type { FillerPlaybackPort, FillerPlaybackSession } from '@/ports/FillerPlaybackPort';
import { systemClock } from '@/infrastructure/time/systemClock';
import { createLogger } from '@/shared/logging/logger';

/** The slice of a child process the player relies on. */
export interface PlayerProcess {
  readonly exitCode: number | null;
  readonly signalCode: NodeJS.Signals | null;
  on(event: 'error', listener: (error: Error) => void): unknown;
  once(event: 'spawn', listener: () => void): unknown;
  once(event: 'error', listener: (error: Error) => void): unknown;
  kill(signal?: NodeJS.Signals): boolean;
}

export type ProcessSpawner = (command: string, args: string[]) => PlayerProcess;

export type DurationProbe = (filePath: string) => Promise<number>;

const spawnDetached: ProcessSpawner = (command, args) =>
  spawn(command, args, { stdio: 'ignore', detached: false });

/** Total duration in ms from the file's own headers; 0 when unknown. */
export const probeDurationMs: DurationProbe = async (filePath) => {
  const meta = await parseFile(filePath, { duration: true });
  const seconds = meta.format.duration;
  return typeof seconds === 'number' && seconds > 0 ? Math.round(seconds * 1000) : 0;
};

export function buildPlayerArgs(command: string, filePath: string): string[] {
  if (path.basename(command) === 'ffplay') {
    return ['-nodisp', '-autoexit', '-loglevel', 'error', filePath];
  }
  return [filePath];
}

export type LocalFillerPlayerOptions = {
  command: string;
  spawn?: ProcessSpawner;
  probeDuration?: DurationProbe;
  clock?: ClockPort;
};

/**
 * Plays filler tracks through an external command-line player on the
 * default output.
 */
export class LocalFillerPlayer implements FillerPlaybackPort {
  private readonly log = createLogger('Filler', 'LocalPlayer');
  private readonly command: string;
  private readonly spawnProcess: ProcessSpawner;
  private readonly probeDuration: DurationProbe;
  private readonly clock: ClockPort;
  private readonly live = new Set<PlayerProcess>();

  constructor(options: LocalFillerPlayerOptions) {
    this.command = options.command;
    this.spawnProcess = options.spawn ?? spawnDetached;
    this.probeDuration = options.probeDuration ?? probeDurationMs;
    this.clock = options.clock ?? systemClock;
  }

  public async play(filePath: string): Promise<FillerPlaybackSession> {
    const args = buildPlayerArgs(this.command, filePath);
    this.log.debug('starting filler player', { command: this.command, file: filePath });
    const proc = this.spawnProcess(this.command, args);
    await new Promise<void>((resolve, reject) => {
      proc.once('spawn', () => resolve());
      proc.once('error', reject);
    });
    const startedAt = this.clock.now();
    this.live.add(proc);
    proc.on('error', (error) => {
      this.log.warn('filler player error', { file: filePath, message: error.message });
    });

    return {
      durationMs: () => this.probeDuration(filePath),
      elapsedMs: () => this.clock.now() - startedAt,
      stop: () => this.terminate(proc),
    };
  }

  public stopAll(): void {
    for (const proc of [...this.live]) {
      this.log.info('stopping filler player left running');
      this.terminate(proc);
    }
  }

  private terminate(proc: PlayerProcess): void {
    this.live.delete(proc);
    if (proc.exitCode !== null || proc.signalCode !== null) {
      return;
    }
    proc.kill('SIGTERM');
  }
}
