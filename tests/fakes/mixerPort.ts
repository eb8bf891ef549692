import type { MixerPort, MixerStream, MuteFlag } from '../../src/ports/MixerPort';

export type MuteCall = { streamId: number; flag: MuteFlag };

export type MixerFakeOptions = {
  streams?: MixerStream[];
  resolveError?: Error;
  setMuteError?: Error;
  onSetMute?: (call: MuteCall) => void;
};

export function makeMixerFake(options: MixerFakeOptions = {}): { mixer: MixerPort; calls: MuteCall[] } {
  const streams = options.streams ?? [{ id: 42, appName: 'Spotify' }];
  const calls: MuteCall[] = [];
  const mixer: MixerPort = {
    resolveStreamId: async (appName) => {
      if (options.resolveError) {
        throw options.resolveError;
      }
      return streams.find((stream) => stream.appName === appName)?.id ?? null;
    },
    setMute: async (streamId, flag) => {
      if (options.setMuteError) {
        throw options.setMuteError;
      }
      const call = { streamId, flag };
      calls.push(call);
      options.onSetMute?.(call);
    },
  };
  return { mixer, calls };
}
