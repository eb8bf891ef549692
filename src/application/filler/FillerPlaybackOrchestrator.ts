import type { MuteController } from '@/application/audio/MuteController';
import type { ClockPort } from '@/ports/ClockPort';
import type {
  FillerLibraryPort,
  FillerPlaybackPort,
  FillerPlaybackSession,
} from '@/ports/FillerPlaybackPort';
import { bestEffort, errorMessage } from '@/shared/bestEffort';
import { createLogger, type ComponentLogger } from '@/shared/logging/logger';

export const DEFAULT_SETTLE_DELAY_MS = 1500;

export type FillerSkipReason = 'empty-library' | 'library-unreadable' | 'playback-failed';

export type FillerJobOutcome =
  | { kind: 'played'; file: string; durationMs: number }
  | { kind: 'skipped'; reason: FillerSkipReason };

export type FillerJob = {
  /** Settles after the stream is unmuted and the guard is released. Never rejects. */
  done: Promise<FillerJobOutcome>;
};

export type FillerOrchestratorDeps = {
  muteController: MuteController;
  library: FillerLibraryPort;
  playback: FillerPlaybackPort;
  clock: ClockPort;
  settleDelayMs?: number;
  random?: () => number;
  log?: ComponentLogger;
};

/**
 * Masks an ad with one local track. At most one job runs at a time; a
 * detection that arrives while a job runs is dropped.
 */
export class FillerPlaybackOrchestrator {
  private readonly muteController: MuteController;
  private readonly library: FillerLibraryPort;
  private readonly playback: FillerPlaybackPort;
  private readonly clock: ClockPort;
  private readonly settleDelayMs: number;
  private readonly random: () => number;
  private readonly log: ComponentLogger;
  private active: Promise<FillerJobOutcome> | null = null;

  constructor(deps: FillerOrchestratorDeps) {
    this.muteController = deps.muteController;
    this.library = deps.library;
    this.playback = deps.playback;
    this.clock = deps.clock;
    this.settleDelayMs = deps.settleDelayMs ?? DEFAULT_SETTLE_DELAY_MS;
    this.random = deps.random ?? Math.random;
    this.log = deps.log ?? createLogger('Filler', 'Orchestrator');
  }

  public isRunning(): boolean {
    return this.active !== null;
  }

  public async whenIdle(): Promise<void> {
    if (this.active) {
      await this.active;
    }
  }

  /**
   * Starts a job unless one is in flight. `onAdEnd` runs after the filler
   * track and before the stream is unmuted.
   */
  public start(onAdEnd: () => Promise<unknown>): FillerJob | null {
    if (this.active) {
      this.log.debug('filler job already running; dropping detection');
      return null;
    }
    const done = this.run(onAdEnd).finally(() => {
      this.active = null;
    });
    this.active = done;
    return { done };
  }

  private async run(onAdEnd: () => Promise<unknown>): Promise<FillerJobOutcome> {
    await this.muteController.mute();
    let outcome: FillerJobOutcome;
    try {
      outcome = await this.playFiller(onAdEnd);
    } catch (error) {
      this.log.warn('filler job failed', { message: errorMessage(error) });
      outcome = { kind: 'skipped', reason: 'playback-failed' };
    }
    await this.muteController.unmute();
    return outcome;
  }

  private async playFiller(onAdEnd: () => Promise<unknown>): Promise<FillerJobOutcome> {
    let files: string[];
    try {
      files = await this.library.listFiles();
    } catch (error) {
      this.log.warn('filler library unreadable', { message: errorMessage(error) });
      return { kind: 'skipped', reason: 'library-unreadable' };
    }
    if (files.length === 0) {
      this.log.warn('filler library is empty');
      return { kind: 'skipped', reason: 'empty-library' };
    }

    const file = this.pick(files);
    let session: FillerPlaybackSession;
    try {
      session = await this.playback.play(file);
    } catch (error) {
      this.log.warn('filler playback failed to start', { file, message: errorMessage(error) });
      return { kind: 'skipped', reason: 'playback-failed' };
    }

    let durationMs = 0;
    try {
      // Some backends report 0 until the stream is primed.
      await this.clock.sleep(this.settleDelayMs);
      durationMs = await bestEffort(() => session.durationMs(), {
        fallback: 0,
        onError: 'debug',
        label: 'filler duration probe failed',
        context: { file },
        log: this.log,
      });
      const remainingMs = Math.max(0, durationMs - session.elapsedMs());
      this.log.debug('playing filler', { file, durationMs, remainingMs });
      await this.clock.sleep(remainingMs);
    } finally {
      session.stop();
    }

    await bestEffort(onAdEnd, {
      fallback: undefined,
      onError: 'debug',
      label: 'resume after filler failed',
      context: { file },
      log: this.log,
    });
    return { kind: 'played', file, durationMs };
  }

  private pick(files: string[]): string {
    const index = Math.min(files.length - 1, Math.floor(this.random() * files.length));
    return files[index];
  }
}
