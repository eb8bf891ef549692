import type { AppConfig } from '@/config';
import type { ClockPort } from '@/ports/ClockPort';
import type { FillerLibraryPort, FillerPlaybackPort } from '@/ports/FillerPlaybackPort';
import type { InstanceLockPort } from '@/ports/InstanceLockPort';
import type { MixerPort } from '@/ports/MixerPort';
import type { PlayerPort } from '@/ports/PlayerPort';
import { MprisPlayerService } from '@/adapters/mpris/MprisPlayerService';
import { PulseMixer } from '@/adapters/mixer/PulseMixer';
import { LocalFillerPlayer } from '@/adapters/playback/LocalFillerPlayer';
import { LocalFillerLibrary } from '@/adapters/library/LocalFillerLibrary';
import { AbstractSocketLock } from '@/adapters/lock/AbstractSocketLock';
import { systemClock } from '@/infrastructure/time/systemClock';

export type RuntimePorts = {
  player: PlayerPort;
  mixer: MixerPort;
  playback: FillerPlaybackPort;
  /** Null in simple mode. */
  library: FillerLibraryPort | null;
  lock: InstanceLockPort;
  clock: ClockPort;
};

/**
 * Builds the production adapters; any port given in `overrides` is used as is.
 */
export function createRuntimePorts(
  config: AppConfig,
  overrides: Partial<RuntimePorts> = {},
): RuntimePorts {
  const clock = overrides.clock ?? systemClock;
  const library =
    overrides.library !== undefined
      ? overrides.library
      : config.filler.mode === 'filler'
        ? new LocalFillerLibrary(config.filler.directory)
        : null;
  return {
    clock,
    library,
    player: overrides.player ?? new MprisPlayerService(),
    mixer: overrides.mixer ?? new PulseMixer(),
    playback:
      overrides.playback ?? new LocalFillerPlayer({ command: config.env.fillerPlayerCommand, clock }),
    lock: overrides.lock ?? new AbstractSocketLock(config.env.lockName),
  };
}
