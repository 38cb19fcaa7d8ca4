/**
 * Controller transformation types.
 */

/** A learned correspondence between two feature names. */
export interface FeatureTranslation {
  fromFeature: string;
  toFeature: string;
}

/**
 * Translations observed together on one device for one profile pair,
 * sorted by fromFeature then toFeature.
 */
export type FeatureMap = readonly FeatureTranslation[];

/** One learned pattern and how many devices produced it. */
export interface FeatureMapEntry {
  features: FeatureMap;
  count: number;
}

/** Unordered profile pair, stored with fromController < toController. */
export interface ControllerTranslationKey {
  fromController: string;
  toController: string;
}
