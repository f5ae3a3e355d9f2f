/**
 * Earth Engine initialisation
 *
 * One session per process. The first successful call fixes the active
 * project; later calls with the same project get the same session back, a
 * different project is a ConfigurationError.
 */

import type { ForestAtlasConfig } from '../../core/config.js';
import { ConfigurationError } from '../../core/errors.js';
import type { FetchFn } from '../../core/http-client.js';
import { createLogger } from '../../core/utils/logger.js';
import { Image } from '../image.js';
import type { RasterSession } from '../session.js';
import { EarthEngineSession } from './session.js';

const log = createLogger({ module: 'earth-engine' });

/**
 * Injected collaborators for initialisation (tests swap in a fake session)
 */
export interface InitializeDependencies {
  readonly fetchFn?: FetchFn;
  readonly createSession?: (projectId: string, accessToken: string) => RasterSession;
}

/**
 * Everything an extractor needs from the raster service
 */
export class EarthEngineContext {
  private hansenImage: Image | null = null;

  constructor(
    readonly session: RasterSession,
    readonly config: ForestAtlasConfig
  ) {}

  get projectId(): string {
    return this.session.projectId;
  }

  /** Hansen Global Forest Change image, built on first access */
  get hansen(): Image {
    if (!this.hansenImage) {
      this.hansenImage = Image.load(this.config.hansen.assetId);
    }
    return this.hansenImage;
  }
}

let activeSession: RasterSession | null = null;

export function initializeEarthEngine(
  config: ForestAtlasConfig,
  deps: InitializeDependencies = {}
): EarthEngineContext {
  const { projectId, accessToken } = config.earthEngine;

  if (!projectId) {
    throw new ConfigurationError(
      'Earth Engine project id is not configured (set FOREST_ATLAS_EE_PROJECT_ID or earthEngine.projectId)'
    );
  }

  if (activeSession) {
    if (activeSession.projectId !== projectId) {
      throw new ConfigurationError(
        `Earth Engine already initialised for project ${activeSession.projectId}, cannot switch to ${projectId}`
      );
    }
    return new EarthEngineContext(activeSession, config);
  }

  if (!accessToken) {
    throw new ConfigurationError(
      'Earth Engine access token is not configured (set FOREST_ATLAS_EE_ACCESS_TOKEN)'
    );
  }

  activeSession = deps.createSession
    ? deps.createSession(projectId, accessToken)
    : new EarthEngineSession({
        projectId,
        accessToken,
        config: config.earthEngine,
        fetchFn: deps.fetchFn,
      });

  log.info('Earth Engine session initialised', { projectId });
  return new EarthEngineContext(activeSession, config);
}

/**
 * Forget the active session (tests only)
 */
export function resetEarthEngine(): void {
  activeSession = null;
}
