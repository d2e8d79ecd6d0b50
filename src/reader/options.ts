import {
  FONT_SIZE_RATIO,
  MAX_PARTS_IN_CURVE,
  SEGMENT_ROTATION_ANGLES,
} from '../constants/card';

export interface CardReaderOptions {
  /** Angles (degrees) a segment may be rotated by */
  segmentRotationAngles?: readonly number[];
  /** Max commands after the initial move of a curve */
  maxPartsInCurve?: number;
  /** font-size must be round(image height / fontSizeRatio) */
  fontSizeRatio?: number;
  /** Log a one-line summary per read */
  verbose?: boolean;
}

export type ResolvedReaderOptions = Required<CardReaderOptions>;

export function resolveReaderOptions(options: CardReaderOptions = {}): ResolvedReaderOptions {
  return {
    segmentRotationAngles: options.segmentRotationAngles ?? SEGMENT_ROTATION_ANGLES,
    maxPartsInCurve: options.maxPartsInCurve ?? MAX_PARTS_IN_CURVE,
    fontSizeRatio: options.fontSizeRatio ?? FONT_SIZE_RATIO,
    verbose: options.verbose ?? false,
  };
}
