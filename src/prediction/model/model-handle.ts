/**
 * Regression model handles.
 *
 * A handle is loaded once at startup from a JSON artifact exported from the
 * training pipeline's scikit-learn estimators, then shared read-only by
 * every request.
 *
 * **Artifact format:**
 * ```json
 * { "type": "linear_regression",
 *   "features": ["median_income", "housing_median_age", ...],
 *   "coefficients": [0.44, 0.0097, ...],
 *   "intercept": -36.9 }
 *
 * { "type": "decision_tree",
 *   "features": [...],
 *   "tree": { "children_left": [...], "children_right": [...],
 *             "feature": [...], "threshold": [...], "value": [...] } }
 * ```
 *
 * @example
 * ```typescript
 * const model = loadModel('models/LinearRegression.json');
 * const price = model.score(deriveFeatures(request));
 * ```
 */

import { readFileSync } from 'node:fs';
import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { ModelLoadError, ModelMismatchError, describeError } from '../../common/errors';
import { toFieldErrors } from '../../common/validation';
import { FEATURE_ORDER, FeatureVector } from '../features';
import { ModelArtifactDto, ModelKind, TreeStructureDto } from './model-artifact.dto';

export interface ModelHandle {
  readonly kind: ModelKind;
  readonly featureNames: readonly string[];
  readonly featureCount: number;
  /** Pure; throws ModelMismatchError on a wrong-sized vector or a non-finite score. */
  score(vector: FeatureVector): number;
}

abstract class RegressionModel implements ModelHandle {
  abstract readonly kind: ModelKind;

  constructor(readonly featureNames: readonly string[]) {}

  get featureCount(): number {
    return this.featureNames.length;
  }

  score(vector: FeatureVector): number {
    if (vector.length !== this.featureCount) {
      throw new ModelMismatchError(
        `Model expects ${this.featureCount} features but received ${vector.length}`,
      );
    }
    const y = this.evaluate(vector.values);
    if (!Number.isFinite(y)) {
      throw new ModelMismatchError(`Model score overflowed for the given input (${y})`);
    }
    return y;
  }

  protected abstract evaluate(x: readonly number[]): number;
}

export class LinearRegressionModel extends RegressionModel {
  readonly kind = 'linear_regression' as const;
  private readonly coefficients: readonly number[];

  constructor(
    featureNames: readonly string[],
    coefficients: readonly number[],
    private readonly intercept: number,
  ) {
    super(featureNames);
    if (coefficients.length !== featureNames.length) {
      throw new RangeError(
        `${coefficients.length} coefficients for ${featureNames.length} features`,
      );
    }
    this.coefficients = [...coefficients];
  }

  protected evaluate(x: readonly number[]): number {
    return this.coefficients.reduce((sum, c, i) => sum + c * x[i], this.intercept);
  }
}

export class DecisionTreeModel extends RegressionModel {
  readonly kind = 'decision_tree' as const;
  private readonly tree: TreeStructureDto;

  constructor(featureNames: readonly string[], tree: TreeStructureDto) {
    super(featureNames);
    assertTreeShape(tree, featureNames.length);
    this.tree = tree;
  }

  protected evaluate(x: readonly number[]): number {
    const { children_left, children_right, feature, threshold, value } = this.tree;
    let node = 0;
    // children always point forward, so this walk terminates
    while (children_left[node] !== -1) {
      node =
        x[feature[node]] <= threshold[node] ? children_left[node] : children_right[node];
    }
    return value[node];
  }
}

function assertTreeShape(tree: TreeStructureDto, featureCount: number): void {
  const size = tree.children_left.length;
  const arrays = [tree.children_right, tree.feature, tree.threshold, tree.value];
  if (size === 0 || arrays.some((a) => a.length !== size)) {
    throw new RangeError('tree arrays must be non-empty and of equal length');
  }

  for (let node = 0; node < size; node++) {
    const left = tree.children_left[node];
    const right = tree.children_right[node];
    if (left === -1 && right === -1) continue;

    const valid = (child: number) => child > node && child < size;
    if (!valid(left) || !valid(right)) {
      throw new RangeError(`node ${node} has invalid children (${left}, ${right})`);
    }
    const f = tree.feature[node];
    if (f < 0 || f >= featureCount) {
      throw new RangeError(`node ${node} splits on unknown feature index ${f}`);
    }
  }
}

/** Build a handle from an already parsed artifact. */
export function modelFromArtifact(raw: unknown, artifactPath: string): ModelHandle {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new ModelLoadError(artifactPath, 'artifact must be a JSON object');
  }

  const artifact = plainToInstance(ModelArtifactDto, raw);
  const problems = toFieldErrors(validateSync(artifact));
  if (problems.length) {
    const summary = problems.map((p) => `${p.field}: ${p.messages.join('; ')}`).join(', ');
    throw new ModelLoadError(artifactPath, `invalid artifact (${summary})`);
  }

  const { features } = artifact;
  const matchesSchema =
    features.length === FEATURE_ORDER.length &&
    FEATURE_ORDER.every((name, i) => features[i] === name);
  if (!matchesSchema) {
    throw new ModelLoadError(
      artifactPath,
      `feature order [${features.join(', ')}] does not match [${FEATURE_ORDER.join(', ')}]`,
    );
  }

  try {
    return buildModel(artifact);
  } catch (error) {
    throw new ModelLoadError(artifactPath, describeError(error), { cause: error });
  }
}

function buildModel(artifact: ModelArtifactDto): ModelHandle {
  if (artifact.type === 'decision_tree') {
    if (!artifact.tree) throw new RangeError('tree is missing');
    return new DecisionTreeModel(artifact.features, artifact.tree);
  }
  return new LinearRegressionModel(
    artifact.features,
    artifact.coefficients ?? [],
    artifact.intercept ?? 0,
  );
}

/**
 * Read and validate the artifact at `artifactPath`.
 * Any failure is a ModelLoadError: a missing model is a deployment error.
 */
export function loadModel(artifactPath: string): ModelHandle {
  let text: string;
  try {
    text = readFileSync(artifactPath, 'utf8');
  } catch (error) {
    throw new ModelLoadError(artifactPath, describeError(error), { cause: error });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ModelLoadError(artifactPath, `malformed JSON: ${describeError(error)}`, {
      cause: error,
    });
  }
  return modelFromArtifact(raw, artifactPath);
}
