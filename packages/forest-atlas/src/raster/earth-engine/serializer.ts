/**
 * Earth Engine expression serialisation
 *
 * Translates ImageExpression trees into the `Expression` JSON accepted by the
 * Earth Engine REST API (`projects/{project}/value:compute`). Every
 * sub-expression is inlined as a nested `functionInvocationValue`.
 */

import type { RegionGeometry } from '../../core/types.js';
import type {
  CollectionExpression,
  ImageExpression,
  ReducerKind,
} from '../image.js';

// ============================================================================
// REST Value Types
// ============================================================================

export type ValueNode =
  | { readonly constantValue: unknown }
  | { readonly functionInvocationValue: FunctionInvocation }
  | { readonly arrayValue: { readonly values: readonly ValueNode[] } };

export interface FunctionInvocation {
  readonly functionName: string;
  readonly arguments: Readonly<Record<string, ValueNode>>;
}

export interface ComputeExpression {
  readonly result: string;
  readonly values: Readonly<Record<string, ValueNode>>;
}

// ============================================================================
// Helpers
// ============================================================================

function constant(value: unknown): ValueNode {
  return { constantValue: value };
}

function invoke(functionName: string, args: Record<string, ValueNode> = {}): ValueNode {
  return { functionInvocationValue: { functionName, arguments: args } };
}

const COMPARISON_FUNCTIONS = {
  eq: 'Image.eq',
  gte: 'Image.gte',
} as const;

const BINARY_FUNCTIONS = {
  multiply: 'Image.multiply',
  divide: 'Image.divide',
  and: 'Image.and',
} as const;

const REDUCER_FUNCTIONS: Record<ReducerKind, string> = {
  sum: 'Reducer.sum',
  mean: 'Reducer.mean',
  mode: 'Reducer.mode',
};

// ============================================================================
// Serialisers
// ============================================================================

export function serializeGeometry(geometry: RegionGeometry): ValueNode {
  const functionName =
    geometry.type === 'Polygon'
      ? 'GeometryConstructors.Polygon'
      : 'GeometryConstructors.MultiPolygon';

  return invoke(functionName, {
    coordinates: constant(geometry.coordinates),
    evenOdd: constant(true),
  });
}

export function serializeCollection(collection: CollectionExpression): ValueNode {
  const loaded = invoke('ImageCollection.load', { id: constant(collection.collectionId) });

  const bounded = invoke('Collection.filter', {
    collection: loaded,
    filter: invoke('Filter.intersects', {
      leftField: constant('.all'),
      rightValue: serializeGeometry(collection.region),
    }),
  });

  return invoke('Collection.filter', {
    collection: bounded,
    filter: invoke('Filter.dateRangeContains', {
      leftValue: invoke('DateRange', {
        start: invoke('Date', { value: constant(collection.startDate) }),
        end: invoke('Date', { value: constant(collection.endDate) }),
      }),
      rightField: constant('system:time_start'),
    }),
  });
}

export function serializeReducer(reducer: ReducerKind): ValueNode {
  return invoke(REDUCER_FUNCTIONS[reducer]);
}

export function serializeImage(expression: ImageExpression): ValueNode {
  switch (expression.op) {
    case 'load':
      return invoke('Image.load', { id: constant(expression.assetId) });

    case 'constant':
      return invoke('Image.constant', { value: constant(expression.value) });

    case 'pixelArea':
      return invoke('Image.pixelArea');

    case 'select':
      return invoke('Image.select', {
        input: serializeImage(expression.input),
        bandSelectors: constant(expression.bands),
      });

    case 'rename':
      return invoke('Image.rename', {
        input: serializeImage(expression.input),
        names: constant(expression.names),
      });

    case 'compare':
      return invoke(COMPARISON_FUNCTIONS[expression.operator], {
        image1: serializeImage(expression.left),
        image2: serializeImage(expression.right),
      });

    case 'binary':
      return invoke(BINARY_FUNCTIONS[expression.operator], {
        image1: serializeImage(expression.left),
        image2: serializeImage(expression.right),
      });

    case 'mask':
      return invoke('Image.mask', { image: serializeImage(expression.input) });

    case 'updateMask':
      return invoke('Image.updateMask', {
        image: serializeImage(expression.input),
        mask: serializeImage(expression.mask),
      });

    case 'unmask':
      return invoke('Image.unmask', {
        input: serializeImage(expression.input),
        value: serializeImage(expression.fallback),
      });

    case 'addBands':
      return invoke('Image.addBands', {
        dstImg: serializeImage(expression.input),
        srcImg: serializeImage(expression.other),
      });

    case 'composite':
      // Per-band reducers, so selecting after the reduction is equivalent
      return invoke('Image.select', {
        input: invoke(`reduce.${expression.reducer}`, {
          collection: serializeCollection(expression.collection),
        }),
        bandSelectors: constant(expression.collection.bands),
      });

    case 'qualityMosaic':
      return invoke('ImageCollection.qualityMosaic', {
        collection: invoke('ImageCollection.fromImages', {
          images: { arrayValue: { values: expression.images.map(serializeImage) } },
        }),
        qualityBand: constant(expression.qualityBand),
      });
  }
}

/**
 * Wrap a root value node as a compute expression
 */
export function toComputeExpression(root: ValueNode): ComputeExpression {
  return { result: '0', values: { '0': root } };
}
