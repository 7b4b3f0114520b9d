import { IsNumber, IsPositive } from 'class-validator';

const FINITE = { allowNaN: false, allowInfinity: false } as const;

/** Raw request attributes, in the order callers document them. */
export const PREDICTION_REQUEST_FIELDS = [
  'total_rooms',
  'total_bedrooms',
  'population',
  'households',
  'median_income',
  'housing_median_age',
  'latitude',
  'longitude',
] as const;

export type PredictionRequestField = (typeof PREDICTION_REQUEST_FIELDS)[number];

export type PredictionRequest = Readonly<Record<PredictionRequestField, number>>;

/**
 * Top-level DTO for a prediction request.
 * Unknown properties are rejected by the global ValidationPipe.
 */
export class PredictRequestDto implements PredictionRequest {
  @IsNumber(FINITE)
  total_rooms!: number;

  @IsNumber(FINITE)
  total_bedrooms!: number;

  @IsNumber(FINITE)
  population!: number;

  // Denominator for every per-household average
  @IsNumber(FINITE)
  @IsPositive()
  households!: number;

  @IsNumber(FINITE)
  median_income!: number;

  @IsNumber(FINITE)
  housing_median_age!: number;

  @IsNumber(FINITE)
  latitude!: number;

  @IsNumber(FINITE)
  longitude!: number;
}

/**
 * DTO for response
 */
export class PredictResponseDto {
  predicted_price!: number;
}

/** Copy just the request attributes into a plain, stably ordered object. */
export function toPayload(request: PredictionRequest): PredictionRequest {
  return {
    total_rooms: request.total_rooms,
    total_bedrooms: request.total_bedrooms,
    population: request.population,
    households: request.households,
    median_income: request.median_income,
    housing_median_age: request.housing_median_age,
    latitude: request.latitude,
    longitude: request.longitude,
  };
}
