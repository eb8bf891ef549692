export type FillerPlaybackSession = {
  /** Total length in ms; 0 until the backend knows it. */
  durationMs: () => Promise<number>;
  elapsedMs: () => number;
  stop: () => void;
};

export interface FillerPlaybackPort {
  /** Rejects when playback cannot start. */
  play: (filePath: string) => Promise<FillerPlaybackSession>;
  /** Stops every session still playing; used at shutdown. */
  stopAll: () => void;
}

export interface FillerLibraryPort {
  listFiles: () => Promise<string[]>;
}
