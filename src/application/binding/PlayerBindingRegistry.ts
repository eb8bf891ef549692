import type { TrackMetadataEvent } from '@/domain/playback/types';
import type {
  PlayerPort,
  PlayerPresenceWatch,
  PlayerSubscription,
} from '@/ports/PlayerPort';
import { bestEffort, bestEffortSync, errorMessage } from '@/shared/bestEffort';
import { createLogger, type ComponentLogger } from '@/shared/logging/logger';

type AttachResult = 'bound' | 'stale' | 'failed';

export type PlayerBindingDeps = {
  player: PlayerPort;
  playerName: string;
  onMetadata: (event: TrackMetadataEvent) => void;
  log?: ComponentLogger;
};

/**
 * Keeps exactly one metadata subscription to the tracked player while it is
 * on the bus, and re-arms whenever it disappears.
 */
export class PlayerBindingRegistry {
  private readonly player: PlayerPort;
  private readonly playerName: string;
  private readonly onMetadata: (event: TrackMetadataEvent) => void;
  private readonly log: ComponentLogger;
  private bound = false;
  private attaching = false;
  private appearedDuringAttach = false;
  private generation = 0;
  private subscription: PlayerSubscription | null = null;
  private presence: PlayerPresenceWatch | null = null;
  private started = false;

  constructor(deps: PlayerBindingDeps) {
    this.player = deps.player;
    this.playerName = deps.playerName;
    this.onMetadata = deps.onMetadata;
    this.log = deps.log ?? createLogger('Player', 'Binding');
  }

  public isBound(): boolean {
    return this.bound;
  }

  public async start(): Promise<void> {
    if (this.started) {
      return;
    }
    this.started = true;
    this.presence = await this.player.watchPresence({
      onAppear: (name) => {
        void this.onAppear(name);
      },
      onVanish: (name) => this.onVanish(name),
    });
    const running = await bestEffort(() => this.player.listPlayers(), {
      fallback: [],
      onError: 'warn',
      label: 'listing players failed',
      log: this.log,
    });
    if (running.includes(this.playerName)) {
      await this.onAppear(this.playerName);
      return;
    }
    this.log.info('player not running; waiting for it to appear', { player: this.playerName });
  }

  /**
   * Attaches to the player if it is the tracked one and nothing is attached
   * yet. Resolves to whether a new subscription was made. An appearance that
   * arrives while an attach is in flight is remembered, so an attach made
   * stale by a vanish is retried instead of lost.
   */
  public async onAppear(name: string): Promise<boolean> {
    if (name !== this.playerName || this.bound) {
      return false;
    }
    if (this.attaching) {
      this.appearedDuringAttach = true;
      return false;
    }
    this.attaching = true;
    try {
      for (;;) {
        this.appearedDuringAttach = false;
        const result = await this.attach(name);
        if (result !== 'stale' || !this.appearedDuringAttach) {
          return result === 'bound';
        }
        this.log.debug('player reappeared during attach; retrying', { player: name });
      }
    } finally {
      this.attaching = false;
    }
  }

  public onVanish(name: string): void {
    if (name !== this.playerName) {
      return;
    }
    this.generation += 1;
    this.appearedDuringAttach = false;
    if (!this.bound) {
      return;
    }
    this.bound = false;
    this.dropSubscription();
    this.log.info('player vanished; waiting for it to return', { player: name });
  }

  /** Resumes the bound player. A stale or missing handle resolves to false. */
  public async resume(): Promise<boolean> {
    const subscription = this.subscription;
    if (!subscription) {
      this.log.debug('no bound player to resume', { player: this.playerName });
      return false;
    }
    return bestEffort(
      async () => {
        await subscription.resume();
        return true;
      },
      {
        fallback: false,
        onError: 'debug',
        label: 'resume failed',
        context: { player: this.playerName },
        log: this.log,
      },
    );
  }

  public stop(): void {
    this.presence?.stop();
    this.presence = null;
    this.started = false;
    this.generation += 1;
    this.appearedDuringAttach = false;
    this.bound = false;
    this.dropSubscription();
  }

  private async attach(name: string): Promise<AttachResult> {
    const generation = this.generation;
    try {
      const subscription = await this.player.subscribe(name, this.onMetadata);
      if (generation !== this.generation) {
        bestEffortSync(() => subscription.close(), { fallback: undefined });
        this.log.debug('player vanished during attach', { player: name });
        return 'stale';
      }
      this.subscription = subscription;
      this.bound = true;
      this.log.info('bound to player', { player: name });
      return 'bound';
    } catch (error) {
      this.log.warn('failed to subscribe to player', { player: name, message: errorMessage(error) });
      return 'failed';
    }
  }

  private dropSubscription(): void {
    const subscription = this.subscription;
    this.subscription = null;
    if (!subscription) {
      return;
    }
    bestEffortSync(() => subscription.close(), {
      fallback: undefined,
      onError: 'debug',
      label: 'closing player subscription failed',
      log: this.log,
    });
  }
}
