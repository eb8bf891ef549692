/**
 * What the tracked player reported last, reduced to the two fields that
 * carry the ad signature plus the verdict derived from them.
 */
export interface PlaybackState {
  readonly artist: string;
  readonly title: string;
  readonly isAd: boolean;
}

export const INITIAL_PLAYBACK_STATE: PlaybackState = Object.freeze({
  artist: '',
  title: '',
  isAd: false,
});

export function createPlaybackState(artist: string, title: string, isAd: boolean): PlaybackState {
  return Object.freeze({ artist, title, isAd });
}

export function isSamePlaybackState(left: PlaybackState, right: PlaybackState): boolean {
  return left.artist === right.artist && left.title === right.title && left.isAd === right.isAd;
}

/** One metadata change notification, already normalised to plain strings. */
export interface TrackMetadataEvent {
  artist: string;
  title: string;
}

export type OperatingMode = 'filler' | 'simple';
