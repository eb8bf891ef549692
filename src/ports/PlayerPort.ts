import type { TrackMetadataEvent } from '@/domain/playback/types';

export type PlayerPresenceListener = {
  onAppear: (name: string) => void;
  onVanish: (name: string) => void;
};

export type PlayerPresenceWatch = {
  stop: () => void;
};

/**
 * Live attachment to one player: metadata flows to the callback given to
 * `subscribe` until `close` is called.
 */
export type PlayerSubscription = {
  resume: () => Promise<void>;
  close: () => void;
};

export interface PlayerPort {
  listPlayers: () => Promise<string[]>;
  watchPresence: (listener: PlayerPresenceListener) => Promise<PlayerPresenceWatch>;
  subscribe: (
    name: string,
    onMetadata: (event: TrackMetadataEvent) => void,
  ) => Promise<PlayerSubscription>;
  disconnect: () => void;
}
