import type { MuteController } from '@/application/audio/MuteController';
import type { StateTracker } from '@/application/detection/StateTracker';
import type { FillerPlaybackOrchestrator } from '@/application/filler/FillerPlaybackOrchestrator';
import type { TrackMetadataEvent } from '@/domain/playback/types';
import { errorMessage } from '@/shared/bestEffort';
import { createLogger, type ComponentLogger } from '@/shared/logging/logger';

export type AdResponseAction = 'none' | 'mute' | 'unmute' | 'filler-started' | 'filler-busy';

/** Fixed at startup. */
export type AdResponseMode =
  | { kind: 'simple' }
  | {
      kind: 'filler';
      filler: FillerPlaybackOrchestrator;
      resumePlayer: () => Promise<unknown>;
    };

export type AdResponseCoordinatorDeps = {
  mode: AdResponseMode;
  tracker: StateTracker;
  muteController: MuteController;
  log?: ComponentLogger;
};

/**
 * Entry point for every metadata event of the tracked player. Events are
 * handled one after another in arrival order.
 */
export class AdResponseCoordinator {
  private readonly mode: AdResponseMode;
  private readonly tracker: StateTracker;
  private readonly muteController: MuteController;
  private readonly log: ComponentLogger;
  private tail: Promise<void> = Promise.resolve();

  constructor(deps: AdResponseCoordinatorDeps) {
    this.mode = deps.mode;
    this.tracker = deps.tracker;
    this.muteController = deps.muteController;
    this.log = deps.log ?? createLogger('Coordinator');
  }

  public get modeKind(): AdResponseMode['kind'] {
    return this.mode.kind;
  }

  /** Resolves with the action taken for this event; never rejects. */
  public handleMetadata(event: TrackMetadataEvent): Promise<AdResponseAction> {
    const result = this.tail
      .then(() => this.process(event))
      .catch((error: unknown): AdResponseAction => {
        this.log.warn('metadata handling failed', { message: errorMessage(error) });
        return 'none';
      });
    this.tail = result.then(() => undefined);
    return result;
  }

  /** Resolves once every event queued so far has been handled. */
  public drain(): Promise<void> {
    return this.tail;
  }

  private async process(event: TrackMetadataEvent): Promise<AdResponseAction> {
    const { changed, current, previous } = this.tracker.observe(event.artist, event.title);
    if (!changed) {
      this.log.spam('duplicate metadata ignored', { artist: event.artist, title: event.title });
      return 'none';
    }
    this.log.debug('playback state changed', {
      artist: current.artist,
      title: current.title,
      isAd: current.isAd,
      wasAd: previous.isAd,
    });

    let action: AdResponseAction = 'none';
    if (current.isAd) {
      action = await this.onAdDetected();
    } else if (previous.isAd && this.mode.kind === 'simple') {
      await this.muteController.unmute();
      action = 'unmute';
    }
    if (action !== 'none') {
      this.log.debug('ad response', { action, mode: this.mode.kind });
    }
    return action;
  }

  private async onAdDetected(): Promise<AdResponseAction> {
    if (this.mode.kind === 'simple') {
      await this.muteController.mute();
      return 'mute';
    }
    const job = this.mode.filler.start(this.mode.resumePlayer);
    if (!job) {
      return 'filler-busy';
    }
    void job.done.then((outcome) => {
      this.log.info('filler job finished', { ...outcome });
    });
    return 'filler-started';
  }
}
