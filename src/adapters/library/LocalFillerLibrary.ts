import { promises as fs } from 'node:fs';
import path from 'node:path';
import type { FillerLibraryPort } from '@/ports/FillerPlaybackPort';

const AUDIO_EXTENSIONS = new Set(['.mp3', '.flac', '.m4a', '.aac', '.ogg', '.opus', '.wav']);

export function isFillerAudioFile(name: string): boolean {
  return AUDIO_EXTENSIONS.has(path.extname(name).toLowerCase());
}

/**
 * Flat directory of filler tracks. Read on every call so files can be added
 * while the daemon runs.
 */
export class LocalFillerLibrary implements FillerLibraryPort {
  constructor(private readonly directory: string) {}

  public async listFiles(): Promise<string[]> {
    const entries = await fs.readdir(this.directory, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isFile() && isFillerAudioFile(entry.name))
      .map((entry) => path.join(this.directory, entry.name))
      .sort();
  }
}
