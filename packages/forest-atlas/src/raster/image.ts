/**
 * Lazy raster expressions
 *
 * An Image is an immutable description of a computation the remote raster
 * service evaluates; building one never touches the network. Only
 * RasterSession.size() and RasterSession.reduceRegion() issue requests.
 *
 * The operation set is the subset of the Earth Engine image algebra the
 * extractors need.
 */

import type { RegionGeometry } from '../core/types.js';

// ============================================================================
// Expression Types
// ============================================================================

export type ComparisonOperator = 'eq' | 'gte';

export type BinaryOperator = 'multiply' | 'divide' | 'and';

/**
 * Reducers the service applies over a region or across a collection
 */
export type ReducerKind = 'sum' | 'mean' | 'mode';

/**
 * Reducers usable to composite a collection into one image
 */
export type CompositeReducer = Extract<ReducerKind, 'mean' | 'mode'>;

/**
 * Filtered image collection
 */
export interface CollectionExpression {
  readonly collectionId: string;
  readonly region: RegionGeometry;
  /** Inclusive, YYYY-MM-DD */
  readonly startDate: string;
  /** Exclusive, YYYY-MM-DD */
  readonly endDate: string;
  readonly bands: readonly string[];
}

export type ImageExpression =
  | { readonly op: 'load'; readonly assetId: string }
  | { readonly op: 'constant'; readonly value: number }
  | { readonly op: 'pixelArea' }
  | { readonly op: 'select'; readonly input: ImageExpression; readonly bands: readonly string[] }
  | { readonly op: 'rename'; readonly input: ImageExpression; readonly names: readonly string[] }
  | {
      readonly op: 'compare';
      readonly operator: ComparisonOperator;
      readonly left: ImageExpression;
      readonly right: ImageExpression;
    }
  | {
      readonly op: 'binary';
      readonly operator: BinaryOperator;
      readonly left: ImageExpression;
      readonly right: ImageExpression;
    }
  | { readonly op: 'mask'; readonly input: ImageExpression }
  | { readonly op: 'updateMask'; readonly input: ImageExpression; readonly mask: ImageExpression }
  | { readonly op: 'unmask'; readonly input: ImageExpression; readonly fallback: ImageExpression }
  | { readonly op: 'addBands'; readonly input: ImageExpression; readonly other: ImageExpression }
  | {
      readonly op: 'composite';
      readonly collection: CollectionExpression;
      readonly reducer: CompositeReducer;
    }
  | {
      readonly op: 'qualityMosaic';
      readonly images: readonly ImageExpression[];
      readonly qualityBand: string;
    };

type Operand = Image | number;

function toExpression(operand: Operand): ImageExpression {
  return typeof operand === 'number' ? { op: 'constant', value: operand } : operand.expression;
}

// ============================================================================
// Image
// ============================================================================

/**
 * Fluent builder over ImageExpression
 *
 * @example
 * ```typescript
 * const forestKm2 = Image.load(assetId)
 *   .select('treecover2000')
 *   .gte(30)
 *   .multiply(Image.pixelArea())
 *   .divide(1e6);
 * ```
 */
export class Image {
  constructor(readonly expression: ImageExpression) {}

  static load(assetId: string): Image {
    return new Image({ op: 'load', assetId });
  }

  static constant(value: number): Image {
    return new Image({ op: 'constant', value });
  }

  /** Area of each pixel in square metres, band "area" */
  static pixelArea(): Image {
    return new Image({ op: 'pixelArea' });
  }

  /** Single-band image with no valid pixels */
  static empty(bandName: string): Image {
    return Image.constant(0).rename(bandName).updateMask(0);
  }

  /** Per pixel, take every band from the input with the highest valid quality value */
  static qualityMosaic(images: readonly Image[], qualityBand: string): Image {
    return new Image({
      op: 'qualityMosaic',
      images: images.map((image) => image.expression),
      qualityBand,
    });
  }

  select(...bands: string[]): Image {
    return new Image({ op: 'select', input: this.expression, bands });
  }

  rename(...names: string[]): Image {
    return new Image({ op: 'rename', input: this.expression, names });
  }

  eq(value: Operand): Image {
    return this.compare('eq', value);
  }

  gte(value: Operand): Image {
    return this.compare('gte', value);
  }

  and(other: Operand): Image {
    return this.binary('and', other);
  }

  multiply(other: Operand): Image {
    return this.binary('multiply', other);
  }

  divide(other: Operand): Image {
    return this.binary('divide', other);
  }

  /** Validity mask of this image (1 where defined, 0 where masked), same band names */
  mask(): Image {
    return new Image({ op: 'mask', input: this.expression });
  }

  updateMask(mask: Operand): Image {
    return new Image({ op: 'updateMask', input: this.expression, mask: toExpression(mask) });
  }

  /** Replace masked pixels with the fallback's pixels */
  unmask(fallback: Operand): Image {
    return new Image({ op: 'unmask', input: this.expression, fallback: toExpression(fallback) });
  }

  addBands(other: Image): Image {
    return new Image({ op: 'addBands', input: this.expression, other: other.expression });
  }

  private compare(operator: ComparisonOperator, value: Operand): Image {
    return new Image({
      op: 'compare',
      operator,
      left: this.expression,
      right: toExpression(value),
    });
  }

  private binary(operator: BinaryOperator, other: Operand): Image {
    return new Image({
      op: 'binary',
      operator,
      left: this.expression,
      right: toExpression(other),
    });
  }
}

// ============================================================================
// ImageCollection
// ============================================================================

/**
 * Collection filtered by bounds and date, composited per pixel by a reducer
 */
export class ImageCollection {
  constructor(readonly expression: CollectionExpression) {}

  select(...bands: string[]): ImageCollection {
    return new ImageCollection({ ...this.expression, bands });
  }

  mode(): Image {
    return this.reduce('mode');
  }

  mean(): Image {
    return this.reduce('mean');
  }

  private reduce(reducer: CompositeReducer): Image {
    return new Image({ op: 'composite', collection: this.expression, reducer });
  }
}
