import {
  ArrayNotEmpty,
  IsArray,
  IsIn,
  IsInt,
  IsNumber,
  IsString,
  ValidateIf,
  ValidateNested,
} from 'class-validator';
import { Type } from 'class-transformer';

export const MODEL_KINDS = ['linear_regression', 'decision_tree'] as const;

export type ModelKind = (typeof MODEL_KINDS)[number];

const FINITE = { allowNaN: false, allowInfinity: false } as const;

/**
 * Flattened sklearn `tree_` arrays. Node 0 is the root; a leaf has -1 in
 * both child arrays and carries its prediction in `value`.
 */
export class TreeStructureDto {
  @IsArray()
  @ArrayNotEmpty()
  @IsInt({ each: true })
  children_left!: number[];

  @IsArray()
  @IsInt({ each: true })
  children_right!: number[];

  @IsArray()
  @IsInt({ each: true })
  feature!: number[];

  @IsArray()
  @IsNumber(FINITE, { each: true })
  threshold!: number[];

  @IsArray()
  @IsNumber(FINITE, { each: true })
  value!: number[];
}

/**
 * On-disk model artifact written by the training pipeline.
 */
export class ModelArtifactDto {
  @IsIn(MODEL_KINDS)
  type!: ModelKind;

  @IsArray()
  @IsString({ each: true })
  features!: string[];

  @ValidateIf((o: ModelArtifactDto) => o.type === 'linear_regression')
  @IsArray()
  @IsNumber(FINITE, { each: true })
  coefficients?: number[];

  @ValidateIf((o: ModelArtifactDto) => o.type === 'linear_regression')
  @IsNumber(FINITE)
  intercept?: number;

  @ValidateIf((o: ModelArtifactDto) => o.type === 'decision_tree')
  @ValidateNested()
  @Type(() => TreeStructureDto)
  tree?: TreeStructureDto;
}
