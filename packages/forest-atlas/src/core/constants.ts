/**
 * Dataset constants shared by the extractors
 */

/** Square metres per square kilometre */
export const M2_PER_KM2 = 1e6;

/** Square metres per hectare */
export const M2_PER_HA = 10_000;

/** Hansen loss-year band encodes calendar year as (year - HANSEN_YEAR_OFFSET) */
export const HANSEN_YEAR_OFFSET = 2000;

/** Earliest year accepted in an ExtractionRequest */
export const HANSEN_BASELINE_YEAR = 2000;

export const HANSEN_BANDS = {
  treeCover: 'treecover2000',
  lossYear: 'lossyear',
} as const;

export const DYNAMIC_WORLD_BANDS = {
  label: 'label',
  trees: 'trees',
} as const;

/** Dynamic World class index for "trees" */
export const DYNAMIC_WORLD_TREE_CLASS = 1;

/** Band added to historical composites for most-recent-pixel mosaicking */
export const TIMESTAMP_BAND = 'timestamp';

/** Band name of Image.pixelArea() */
export const PIXEL_AREA_BAND = 'area';

/** Periods with fewer images than this are flagged as low-data */
export const LOW_DATA_IMAGE_COUNT = 3;

/** Periods whose current coverage is below this % of the region are flagged partial */
export const PARTIAL_COVERAGE_PCT = 80;

export const MS_PER_DAY = 86_400_000;
