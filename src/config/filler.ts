import { statSync } from 'node:fs';
import path from 'node:path';
import type { OperatingMode } from '@/domain/playback/types';

export type FillerDirectoryProblem = 'missing' | 'not-a-directory';

export type FillerConfig =
  | { mode: Extract<OperatingMode, 'filler'>; directory: string }
  | {
      mode: Extract<OperatingMode, 'simple'>;
      directory: null;
      rejected?: { path: string; problem: FillerDirectoryProblem };
    };

/**
 * Picks the operating mode from the first positional argument: a readable
 * directory selects filler mode, anything else falls back to simple mode.
 */
export function resolveFillerDirectory(argv: readonly string[]): FillerConfig {
  const raw = argv.find((arg) => !arg.startsWith('-'));
  if (!raw) {
    return { mode: 'simple', directory: null };
  }
  const directory = path.resolve(raw);
  let isDirectory: boolean;
  try {
    isDirectory = statSync(directory).isDirectory();
  } catch {
    return { mode: 'simple', directory: null, rejected: { path: directory, problem: 'missing' } };
  }
  if (!isDirectory) {
    return {
      mode: 'simple',
      directory: null,
      rejected: { path: directory, problem: 'not-a-directory' },
    };
  }
  return { mode: 'filler', directory };
}
