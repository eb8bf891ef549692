export type MixerStream = {
  id: number;
  appName: string;
};

export type MuteFlag = 0 | 1;

export interface MixerPort {
  /** Resolves the stream id for an application tag, or null when it has no stream. */
  resolveStreamId: (appName: string) => Promise<number | null>;
  setMute: (streamId: number, flag: MuteFlag) => Promise<void>;
}
