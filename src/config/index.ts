import { loadEnvironment } from '@/config/environment';
import { resolveFillerDirectory } from '@/config/filler';

/**
 * Aggregates all configuration builders into a single bootstrap helper.
 * `argv` is the argument list after the script path.
 */
export const loadConfig = (
  argv: readonly string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env,
) => {
  return {
    env: loadEnvironment(env),
    filler: resolveFillerDirectory(argv),
  };
};

export type AppConfig = ReturnType<typeof loadConfig>;
