/**
 * Earth Engine REST session
 *
 * RasterSession backed by `POST {apiBaseUrl}/projects/{project}/value:compute`.
 * HTTP failures are mapped onto RasterServiceError:
 *
 * - transient: timeouts, network errors, 408/429/5xx
 * - fatal: 400 (malformed expression or geometry), 401/403 (credentials,
 *   permissions), 404, unparseable responses
 */

import {
  HTTPClient,
  HTTPError,
  HTTPJSONParseError,
  isRetryableError,
  type FetchFn,
} from '../../core/http-client.js';
import { RasterServiceError } from '../../core/errors.js';
import type { EarthEngineConfig } from '../../core/config.js';
import type { ImageCollection } from '../image.js';
import {
  buildCollection,
  type BandValues,
  type CollectionQuery,
  type RasterSession,
  type ReduceRegionRequest,
} from '../session.js';
import {
  serializeCollection,
  serializeGeometry,
  serializeImage,
  serializeReducer,
  toComputeExpression,
  type ValueNode,
} from './serializer.js';

export interface EarthEngineSessionOptions {
  readonly projectId: string;
  readonly accessToken: string;
  readonly config: Pick<EarthEngineConfig, 'apiBaseUrl' | 'timeoutMs'>;
  /** Injected for tests */
  readonly fetchFn?: FetchFn;
}

export class EarthEngineSession implements RasterSession {
  readonly projectId: string;
  private readonly accessToken: string;
  private readonly computeUrl: string;
  private readonly client: HTTPClient;

  constructor(options: EarthEngineSessionOptions) {
    this.projectId = options.projectId;
    this.accessToken = options.accessToken;
    this.computeUrl = `${options.config.apiBaseUrl.replace(/\/+$/, '')}/projects/${encodeURIComponent(
      options.projectId
    )}/value:compute`;
    this.client = new HTTPClient(
      { timeoutMs: options.config.timeoutMs },
      options.fetchFn
    );
  }

  queryCollection(query: CollectionQuery): ImageCollection {
    return buildCollection(query);
  }

  async size(collection: ImageCollection): Promise<number> {
    const result = await this.compute(
      {
        functionInvocationValue: {
          functionName: 'Collection.size',
          arguments: { collection: serializeCollection(collection.expression) },
        },
      }
    );

    if (typeof result !== 'number') {
      throw new RasterServiceError(
        `Collection.size returned ${typeof result}, expected number`,
        'fatal'
      );
    }

    return result;
  }

  async reduceRegion(request: ReduceRegionRequest): Promise<BandValues | null> {
    const result = await this.compute({
      functionInvocationValue: {
        functionName: 'Image.reduceRegion',
        arguments: {
          image: serializeImage(request.image.expression),
          reducer: serializeReducer(request.reducer),
          geometry: serializeGeometry(request.region),
          scale: { constantValue: request.scale },
          maxPixels: { constantValue: request.maxPixels },
        },
      },
    });

    return parseBandValues(result);
  }

  private async compute(root: ValueNode): Promise<unknown> {
    let payload: unknown;
    try {
      payload = await this.client.fetchJSON(this.computeUrl, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${this.accessToken}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({ expression: toComputeExpression(root) }),
      });
    } catch (error) {
      throw toRasterServiceError(error);
    }

    if (typeof payload !== 'object' || payload === null || !('result' in payload)) {
      throw new RasterServiceError('value:compute response has no result field', 'fatal');
    }

    return payload.result;
  }
}

/**
 * Classify a client failure as transient or fatal
 */
export function toRasterServiceError(error: unknown): RasterServiceError {
  if (error instanceof RasterServiceError) {
    return error;
  }

  if (error instanceof HTTPError) {
    return new RasterServiceError(
      `Earth Engine request failed: ${error.message}${error.body ? ` ${error.body}` : ''}`,
      isRetryableError(error) ? 'transient' : 'fatal',
      { statusCode: error.statusCode, cause: error }
    );
  }

  if (error instanceof HTTPJSONParseError) {
    return new RasterServiceError(error.message, 'fatal', { cause: error });
  }

  if (error instanceof Error) {
    return new RasterServiceError(
      `Earth Engine request failed: ${error.message}`,
      isRetryableError(error) ? 'transient' : 'fatal',
      { cause: error }
    );
  }

  return new RasterServiceError(`Earth Engine request failed: ${String(error)}`, 'fatal');
}

/**
 * Validate a reduceRegion dictionary
 */
export function parseBandValues(result: unknown): BandValues | null {
  if (result === null || result === undefined) {
    return null;
  }

  if (typeof result !== 'object' || Array.isArray(result)) {
    throw new RasterServiceError(
      `reduceRegion returned ${Array.isArray(result) ? 'array' : typeof result}, expected dictionary`,
      'fatal'
    );
  }

  const values: Record<string, number | null> = {};
  for (const [band, value] of Object.entries(result)) {
    if (typeof value === 'number') {
      values[band] = value;
    } else if (value === null) {
      values[band] = null;
    } else {
      throw new RasterServiceError(
        `reduceRegion band ${band} has non-numeric value ${JSON.stringify(value)}`,
        'fatal'
      );
    }
  }

  return values;
}
