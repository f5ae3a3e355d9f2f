/**
 * Earth Engine expression serialisation tests
 */

import { describe, it, expect } from 'vitest';

import { Image, ImageCollection } from '../../../raster/image.js';
import {
  serializeCollection,
  serializeGeometry,
  serializeImage,
  toComputeExpression,
} from '../../../raster/earth-engine/serializer.js';
import { TEST_SQUARE } from '../../utils/fixtures.js';

describe('serializeImage', () => {
  it('nests operations as function invocations', () => {
    const image = Image.load('UMD/hansen/test').select('lossyear').eq(23).multiply(Image.pixelArea());

    expect(serializeImage(image.expression)).toEqual({
      functionInvocationValue: {
        functionName: 'Image.multiply',
        arguments: {
          image1: {
            functionInvocationValue: {
              functionName: 'Image.eq',
              arguments: {
                image1: {
                  functionInvocationValue: {
                    functionName: 'Image.select',
                    arguments: {
                      input: {
                        functionInvocationValue: {
                          functionName: 'Image.load',
                          arguments: { id: { constantValue: 'UMD/hansen/test' } },
                        },
                      },
                      bandSelectors: { constantValue: ['lossyear'] },
                    },
                  },
                },
                image2: {
                  functionInvocationValue: {
                    functionName: 'Image.constant',
                    arguments: { value: { constantValue: 23 } },
                  },
                },
              },
            },
          },
          image2: {
            functionInvocationValue: { functionName: 'Image.pixelArea', arguments: {} },
          },
        },
      },
    });
  });

  it('serialises a quality mosaic over an image list', () => {
    const mosaic = Image.qualityMosaic([Image.constant(1), Image.constant(2)], 'timestamp');

    expect(serializeImage(mosaic.expression)).toEqual({
      functionInvocationValue: {
        functionName: 'ImageCollection.qualityMosaic',
        arguments: {
          collection: {
            functionInvocationValue: {
              functionName: 'ImageCollection.fromImages',
              arguments: {
                images: {
                  arrayValue: {
                    values: [
                      {
                        functionInvocationValue: {
                          functionName: 'Image.constant',
                          arguments: { value: { constantValue: 1 } },
                        },
                      },
                      {
                        functionInvocationValue: {
                          functionName: 'Image.constant',
                          arguments: { value: { constantValue: 2 } },
                        },
                      },
                    ],
                  },
                },
              },
            },
          },
          qualityBand: { constantValue: 'timestamp' },
        },
      },
    });
  });

  it('reduces a collection and keeps the selected bands', () => {
    const collection = new ImageCollection({
      collectionId: 'GOOGLE/DYNAMICWORLD/V1',
      region: TEST_SQUARE,
      startDate: '2024-01-01',
      endDate: '2024-02-01',
      bands: ['label', 'trees'],
    });

    const node = serializeImage(collection.select('label').mode().expression);

    expect(node).toMatchObject({
      functionInvocationValue: {
        functionName: 'Image.select',
        arguments: {
          input: { functionInvocationValue: { functionName: 'reduce.mode' } },
          bandSelectors: { constantValue: ['label'] },
        },
      },
    });
  });
});

describe('serializeCollection', () => {
  it('filters by bounds, then by date range', () => {
    const node = serializeCollection({
      collectionId: 'GOOGLE/DYNAMICWORLD/V1',
      region: TEST_SQUARE,
      startDate: '2024-01-01',
      endDate: '2024-02-01',
      bands: ['label'],
    });

    expect(node).toMatchObject({
      functionInvocationValue: {
        functionName: 'Collection.filter',
        arguments: {
          collection: {
            functionInvocationValue: {
              functionName: 'Collection.filter',
              arguments: {
                collection: {
                  functionInvocationValue: {
                    functionName: 'ImageCollection.load',
                    arguments: { id: { constantValue: 'GOOGLE/DYNAMICWORLD/V1' } },
                  },
                },
                filter: { functionInvocationValue: { functionName: 'Filter.intersects' } },
              },
            },
          },
          filter: {
            functionInvocationValue: {
              functionName: 'Filter.dateRangeContains',
              arguments: {
                leftValue: {
                  functionInvocationValue: {
                    functionName: 'DateRange',
                    arguments: {
                      start: {
                        functionInvocationValue: {
                          functionName: 'Date',
                          arguments: { value: { constantValue: '2024-01-01' } },
                        },
                      },
                      end: {
                        functionInvocationValue: {
                          functionName: 'Date',
                          arguments: { value: { constantValue: '2024-02-01' } },
                        },
                      },
                    },
                  },
                },
                rightField: { constantValue: 'system:time_start' },
              },
            },
          },
        },
      },
    });
  });
});

describe('serializeGeometry', () => {
  it('builds an even-odd polygon constructor', () => {
    expect(serializeGeometry(TEST_SQUARE)).toEqual({
      functionInvocationValue: {
        functionName: 'GeometryConstructors.Polygon',
        arguments: {
          coordinates: { constantValue: TEST_SQUARE.coordinates },
          evenOdd: { constantValue: true },
        },
      },
    });
  });
});

describe('toComputeExpression', () => {
  it('wraps the root node as value 0', () => {
    const root = { constantValue: 1 };
    expect(toComputeExpression(root)).toEqual({ result: '0', values: { '0': root } });
  });
});
