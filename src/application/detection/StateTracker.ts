import {
  createPlaybackState,
  INITIAL_PLAYBACK_STATE,
  isSamePlaybackState,
  type PlaybackState,
} from '@/domain/playback/types';
import { classifyIsAd, type AdClassifier } from '@/application/detection/AdClassificationPolicy';

export type Observation = {
  changed: boolean;
  current: PlaybackState;
  previous: PlaybackState;
};

/**
 * Keeps the last two distinct playback states. The player repeats the same
 * change several times per track, so only the first report of a state counts.
 */
export class StateTracker {
  private current: PlaybackState = INITIAL_PLAYBACK_STATE;
  private previous: PlaybackState = INITIAL_PLAYBACK_STATE;

  constructor(private readonly classify: AdClassifier = classifyIsAd) {}

  public observe(artist: string, title: string): Observation {
    const candidate = createPlaybackState(artist, title, this.classify(artist, title));
    if (isSamePlaybackState(candidate, this.current)) {
      return { changed: false, current: this.current, previous: this.previous };
    }
    this.previous = this.current;
    this.current = candidate;
    return { changed: true, current: this.current, previous: this.previous };
  }

  public snapshot(): { current: PlaybackState; previous: PlaybackState } {
    return { current: this.current, previous: this.previous };
  }
}
