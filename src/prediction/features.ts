// src/prediction/features.ts

import { InputValidationError } from '../common/errors';
import type { PredictionRequest } from './dto/predict.dto';

/**
 * Column order the regression models were trained on.
 * Shared by the deriver, the model loader and test fixtures; the loader
 * refuses any artifact whose feature list differs from this one.
 */
export const FEATURE_ORDER = [
  'median_income',
  'housing_median_age',
  'avg_rooms',
  'avg_bedrooms',
  'population',
  'avg_occupancy',
  'latitude',
  'longitude',
] as const;

export type FeatureName = (typeof FEATURE_ORDER)[number];

export type NamedFeatures = Readonly<Record<FeatureName, number>>;

/**
 * Model input. Only constructible from named features, so a correctly
 * sized but reordered vector cannot be built by accident.
 */
export class FeatureVector {
  readonly values: readonly number[];

  private constructor(readonly named: NamedFeatures) {
    this.values = Object.freeze(FEATURE_ORDER.map((name) => named[name]));
  }

  static fromNamed(named: NamedFeatures): FeatureVector {
    return new FeatureVector({ ...named });
  }

  get length(): number {
    return this.values.length;
  }

  toJSON(): NamedFeatures {
    return this.named;
  }
}

/** ---------- feature builder ---------- */

/**
 * Derive the model's feature vector from a raw request.
 * Throws InputValidationError rather than letting Infinity/NaN through.
 */
export function deriveFeatures(request: PredictionRequest): FeatureVector {
  const { households } = request;
  if (!(households > 0)) {
    throw new InputValidationError('households must be greater than zero', [
      { field: 'households', messages: ['households must be greater than zero'] },
    ]);
  }

  const vector = FeatureVector.fromNamed({
    median_income: request.median_income,
    housing_median_age: request.housing_median_age,
    avg_rooms: request.total_rooms / households,
    avg_bedrooms: request.total_bedrooms / households,
    population: request.population,
    avg_occupancy: request.population / households,
    latitude: request.latitude,
    longitude: request.longitude,
  });

  const invalid = FEATURE_ORDER.filter((name) => !Number.isFinite(vector.named[name]));
  if (invalid.length) {
    throw new InputValidationError(
      `Derived features are not finite: ${invalid.join(', ')}`,
      invalid.map((name) => ({ field: name, messages: [`${name} is not a finite number`] })),
    );
  }
  return vector;
}
