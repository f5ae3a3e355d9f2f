/**
 * Shared CLI context
 *
 * Commands receive their collaborators through CommandContext so tests can
 * run them against an in-memory database and a fake raster session.
 *
 * @module cli/context
 */

import { loadConfig, type ForestAtlasConfig } from '../core/config.js';
import { ConfigurationError } from '../core/errors.js';
import { Logger } from '../core/utils/logger.js';
import {
  initializeEarthEngine,
  type EarthEngineContext,
} from '../raster/earth-engine/initialize.js';
import { createDatabaseAdapter } from '../persistence/adapters/factory.js';
import { ForestRepository } from '../persistence/repository.js';

export const EXIT_CODES = {
  SUCCESS: 0,
  RUNTIME_ERROR: 1,
  CONFIG_ERROR: 2,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export interface RepositoryHandle {
  readonly repository: ForestRepository;
  close(): Promise<void>;
}

export interface CommandContext {
  readonly config: ForestAtlasConfig;
  readonly logger: Logger;
  /** Report output (stdout) */
  readonly print: (text: string) => void;
  openRepository(): Promise<RepositoryHandle>;
  earthEngine(): EarthEngineContext;
}

export interface GlobalOptions {
  readonly verbose?: boolean;
  readonly json?: boolean;
  readonly config?: string;
}

export async function createCommandContext(options: GlobalOptions): Promise<CommandContext> {
  const config = await loadConfig({
    configPath: options.config,
    overrides: { verbose: options.verbose, json: options.json },
  });

  const logger = new Logger({
    level: config.logging.level,
    service: 'forest-atlas',
    pretty: !config.logging.json,
    stderr: true,
  });

  return {
    config,
    logger,
    print: (text) => console.log(text),
    async openRepository() {
      const adapter = await createDatabaseAdapter(config.database.url);
      return {
        repository: new ForestRepository(adapter),
        close: () => adapter.close(),
      };
    },
    earthEngine: () => initializeEarthEngine(config),
  };
}

/**
 * Map an error to the process exit code
 */
export function exitCodeFor(error: unknown): ExitCode {
  return error instanceof ConfigurationError ? EXIT_CODES.CONFIG_ERROR : EXIT_CODES.RUNTIME_ERROR;
}
