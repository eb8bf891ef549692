import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import type { MixerPort, MixerStream, MuteFlag } from '@/ports/MixerPort';
import { createLogger } from '@/shared/logging/logger';

const execFileAsync = promisify(execFile);
const PACTL_TIMEOUT_MS = 5000;

export type CommandRunner = (command: string, args: string[]) => Promise<string>;

export const runCommand: CommandRunner = async (command, args) => {
  const { stdout } = await execFileAsync(command, args, { timeout: PACTL_TIMEOUT_MS });
  return stdout;
};

/**
 * Parses `pactl list sink-inputs`. Blocks look like:
 *   Sink Input #45
 *     Driver: protocol-native.c
 *     Properties:
 *       application.name = "Spotify"
 */
export function parseSinkInputs(output: string): MixerStream[] {
  const streams: MixerStream[] = [];
  let currentId: number | null = null;
  let currentApp = '';

  const flush = () => {
    if (currentId !== null) {
      streams.push({ id: currentId, appName: currentApp });
    }
  };

  for (const line of output.split('\n')) {
    const header = line.match(/^Sink Input #(\d+)\s*$/);
    if (header) {
      flush();
      currentId = parseInt(header[1], 10);
      currentApp = '';
      continue;
    }
    const app = line.match(/^\s+application\.name = "(.*)"\s*$/);
    if (app && currentId !== null) {
      currentApp = app[1];
    }
  }
  flush();
  return streams;
}

/**
 * PulseAudio (or pipewire-pulse) sink inputs driven through `pactl`.
 */
export class PulseMixer implements MixerPort {
  private readonly log = createLogger('Audio', 'PulseMixer');

  constructor(private readonly run: CommandRunner = runCommand) {}

  public async resolveStreamId(appName: string): Promise<number | null> {
    const wanted = appName.toLowerCase();
    const streams = await this.listStreams();
    const match = streams.find((stream) => stream.appName.toLowerCase() === wanted);
    this.log.spam('resolved sink input', { app: appName, streams: streams.length, id: match?.id });
    return match ? match.id : null;
  }

  public async setMute(streamId: number, flag: MuteFlag): Promise<void> {
    await this.run('pactl', ['set-sink-input-mute', String(streamId), String(flag)]);
  }

  private async listStreams(): Promise<MixerStream[]> {
    const output = await this.run('pactl', ['list', 'sink-inputs']);
    return parseSinkInputs(output);
  }
}
