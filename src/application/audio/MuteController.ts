import type { MixerPort, MuteFlag } from '@/ports/MixerPort';
import { bestEffort } from '@/shared/bestEffort';
import { createLogger, type ComponentLogger } from '@/shared/logging/logger';

/**
 * Mutes and unmutes the tracked application's own output stream. The
 * device volume is never touched.
 */
export class MuteController {
  private muted = false;

  constructor(
    private readonly mixer: MixerPort,
    private readonly appName: string,
    private readonly log: ComponentLogger = createLogger('Audio', 'Mute'),
  ) {}

  public mute(): Promise<boolean> {
    return this.apply(1);
  }

  public unmute(): Promise<boolean> {
    return this.apply(0);
  }

  public isMuted(): boolean {
    return this.muted;
  }

  private async apply(flag: MuteFlag): Promise<boolean> {
    const context = { app: this.appName, mute: flag };
    const streamId = await bestEffort(() => this.mixer.resolveStreamId(this.appName), {
      fallback: null,
      onError: 'debug',
      label: 'stream lookup failed',
      context,
      log: this.log,
    });
    if (streamId === null) {
      this.log.debug('no output stream for application; skipping', context);
      return false;
    }
    const applied = await bestEffort(
      async () => {
        await this.mixer.setMute(streamId, flag);
        return true;
      },
      {
        fallback: false,
        onError: 'debug',
        label: 'set mute failed',
        context: { ...context, streamId },
        log: this.log,
      },
    );
    if (applied) {
      this.muted = flag === 1;
      this.log.debug(flag === 1 ? 'stream muted' : 'stream unmuted', { ...context, streamId });
    }
    return applied;
  }
}
