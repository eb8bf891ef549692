import { isLogLevel, type LogLevel } from '@/types/logLevel';

/**
 * Canonical view of the process environment consumed by the daemon.
 */
export interface EnvironmentConfig {
  debug: boolean;
  logLevel: LogLevel;
  logJson: boolean;
  /** MPRIS bus name suffix, as in `org.mpris.MediaPlayer2.<playerName>`. */
  playerName: string;
  /** `application.name` of the player's sink input. */
  mixerAppName: string;
  fillerPlayerCommand: string;
  settleDelayMs: number;
  lockName: string;
}

const DEFAULT_ENVIRONMENT: EnvironmentConfig = {
  debug: false,
  logLevel: 'info',
  logJson: false,
  playerName: 'spotify',
  mixerAppName: 'Spotify',
  fillerPlayerCommand: 'ffplay',
  settleDelayMs: 1500,
  lockName: 'adsilencer',
};

const TRUTHY = new Set(['1', 'true', 'yes', 'on']);

/**
 * Reads `ADSILENCER_*` variables over the defaults. The debug flag lowers the
 * log level to debug unless `ADSILENCER_LOG_LEVEL` names one explicitly.
 */
export function loadEnvironment(env: NodeJS.ProcessEnv = process.env): EnvironmentConfig {
  const debug = parseFlag(env.ADSILENCER_DEBUG);
  const explicitLevel = env.ADSILENCER_LOG_LEVEL?.trim().toLowerCase();
  const logLevel =
    explicitLevel && isLogLevel(explicitLevel)
      ? explicitLevel
      : debug
        ? 'debug'
        : DEFAULT_ENVIRONMENT.logLevel;

  return {
    debug,
    logLevel,
    logJson: parseFlag(env.ADSILENCER_LOG_JSON),
    playerName: nonEmpty(env.ADSILENCER_PLAYER) ?? DEFAULT_ENVIRONMENT.playerName,
    mixerAppName: nonEmpty(env.ADSILENCER_MIXER_APP) ?? DEFAULT_ENVIRONMENT.mixerAppName,
    fillerPlayerCommand:
      nonEmpty(env.ADSILENCER_FILLER_PLAYER) ?? DEFAULT_ENVIRONMENT.fillerPlayerCommand,
    settleDelayMs: parseNonNegativeInt(env.ADSILENCER_SETTLE_MS, DEFAULT_ENVIRONMENT.settleDelayMs),
    lockName: nonEmpty(env.ADSILENCER_LOCK_NAME) ?? DEFAULT_ENVIRONMENT.lockName,
  };
}

function parseFlag(raw: string | undefined): boolean {
  return raw !== undefined && TRUTHY.has(raw.trim().toLowerCase());
}

function nonEmpty(raw: string | undefined): string | undefined {
  const value = raw?.trim();
  return value ? value : undefined;
}

function parseNonNegativeInt(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  return Number.isInteger(value) && value >= 0 ? value : fallback;
}
