/**
 * Raster service session contract
 *
 * The session is created once per process by the initialisation layer and
 * passed by reference into every core component. Nothing in the core reaches
 * for a global session.
 */

import type { RegionGeometry } from '../core/types.js';
import { ImageCollection, type Image, type ReducerKind } from './image.js';

/**
 * Per-band result of a region reduction; null marks a band with no valid pixels
 */
export type BandValues = Readonly<Record<string, number | null>>;

export interface CollectionQuery {
  readonly collectionId: string;
  readonly region: RegionGeometry;
  /** Inclusive, YYYY-MM-DD */
  readonly startDate: string;
  /** Exclusive, YYYY-MM-DD */
  readonly endDate: string;
  readonly bands: readonly string[];
}

export interface ReduceRegionRequest {
  readonly image: Image;
  readonly region: RegionGeometry;
  readonly reducer: ReducerKind;
  /** Nominal pixel size in metres */
  readonly scale: number;
  readonly maxPixels: number;
}

/**
 * Remote raster aggregation service
 *
 * Implementations throw RasterServiceError (tagged transient or fatal) for
 * service failures.
 */
export interface RasterSession {
  readonly projectId: string;

  /** Build a filtered collection handle; no request is made */
  queryCollection(query: CollectionQuery): ImageCollection;

  /** Number of images in the collection */
  size(collection: ImageCollection): Promise<number>;

  /** Reduce the image over the region; null when the service returns no dictionary */
  reduceRegion(request: ReduceRegionRequest): Promise<BandValues | null>;
}

/**
 * Shared queryCollection implementation for sessions
 */
export function buildCollection(query: CollectionQuery): ImageCollection {
  return new ImageCollection({
    collectionId: query.collectionId,
    region: query.region,
    startDate: query.startDate,
    endDate: query.endDate,
    bands: [...query.bands],
  });
}
