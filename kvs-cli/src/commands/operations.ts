import chalk from 'chalk';
import { ALL_SURFACES, ConfigurationError, KinesisVideoFacade, ServiceSurface } from 'kvs-facade';
import { createFacade, errorMessage, GlobalOptions } from '../services/facade-factory';

export interface OperationsOptions extends GlobalOptions {
  surface?: string;
  json?: boolean;
}

export async function operationsCommand(options: OperationsOptions): Promise<void> {
  let facade: KinesisVideoFacade | undefined;
  try {
    const surfaces = options.surface === undefined ? ALL_SURFACES : [parseSurface(options.surface)];
    const kvs = createFacade(options);
    facade = kvs;

    if (options.json) {
      const listing = surfaces.flatMap((surface) =>
        kvs.catalog.operationsFor(surface).map((operation) => ({ operation, surface }))
      );
      console.log(JSON.stringify(listing, null, 2));
      return;
    }

    for (const surface of surfaces) {
      const names = kvs.catalog.operationsFor(surface);
      console.log(chalk.blue(`${surface} (${names.length})`));
      for (const name of names) {
        console.log(`  ${name}`);
      }
    }
  } catch (error) {
    console.error(chalk.red('✗ Failed to list operations:'), errorMessage(error));
    process.exitCode = 1;
  } finally {
    facade?.destroy();
  }
}

function parseSurface(value: string): ServiceSurface {
  const surface = ALL_SURFACES.find((candidate) => candidate === value);
  if (!surface) {
    throw new ConfigurationError(
      `Unknown surface "${value}". Expected one of: ${ALL_SURFACES.join(', ')}`
    );
  }
  return surface;
}
