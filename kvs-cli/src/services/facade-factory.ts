import { KinesisVideoFacade, loadFacadeConfig } from 'kvs-facade';

/**
 * Options every command accepts.
 */
export interface GlobalOptions {
  region?: string;
  verbose?: boolean;
}

/**
 * Create a facade from the environment, with command-line flags taking precedence.
 */
export function createFacade(
  options: GlobalOptions = {},
  env: Record<string, string | undefined> = process.env
): KinesisVideoFacade {
  const config = loadFacadeConfig(env);
  return new KinesisVideoFacade(
    { ...config.session, region: options.region ?? config.session.region },
    { verbose: options.verbose === true || config.verbose }
  );
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
