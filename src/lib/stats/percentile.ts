/*
 * Copyright (C) 2025 The OpenPSG Authors
 *
 * This file is licensed under the Functional Source License 1.1
 * with a grant of AGPLv3-or-later effective two years after publication.
 *
 * You may not use this file except in compliance with the License.
 * A copy of the license is available in the root of the repository
 * and online at: https://fsl.software
 *
 * After two years from publication, this file may also be used under
 * the GNU Affero General Public License, version 3 or (at your option) any
 * later version. See <https://www.gnu.org/licenses/agpl-3.0.html> for details.
 */

import { sortedCopy } from "@/lib/alg/stablesort";
import {
  flattenSample,
  isNumeric,
  precisionOf,
  toPrecision,
  type Precision,
} from "@/lib/numeric";
import { EstimatorError } from "@/lib/stats/errors";
import type {
  EstimateOptions,
  PercentileResult,
  Result,
  Sample,
} from "@/lib/types";

// Minimum number of values (raw, and again after filtering) needed for an estimate.
export const MIN_SAMPLE_SIZE = 3;

interface WorkingSample {
  sorted: number[]; // ascending, private copy
  precision: Precision;
}

function failure(
  error: EstimatorError,
  validCount = 0,
): { ok: false; error: EstimatorError; result: PercentileResult } {
  return {
    ok: false,
    error,
    result: {
      threshold: NaN,
      validMin: Number.POSITIVE_INFINITY,
      validMax: Number.NEGATIVE_INFINITY,
      validCount,
    },
  };
}

function checkPercentile(p: unknown): EstimatorError | undefined {
  if (!isNumeric(p) || Number.isNaN(p) || p < 0 || p > 1) {
    return EstimatorError.invalidArgument(
      `percentile must be a number in [0, 1], got ${String(p)}`,
    );
  }
  return undefined;
}

// Validate, convert, filter and sort the sample into a private working copy.
function prepare(
  sample: Sample,
  options: EstimateOptions,
): Result<WorkingSample> {
  const precision = precisionOf(options.highPrecision ?? false);
  const raw = flattenSample(sample);
  if (raw.length < MIN_SAMPLE_SIZE) {
    return failure(
      EstimatorError.invalidArgument(
        `sample must contain at least ${MIN_SAMPLE_SIZE} elements, got ${raw.length}`,
      ),
    );
  }

  const values: number[] = new Array<number>(raw.length);
  for (let i = 0; i < raw.length; i++) {
    const v = raw[i];
    if (!isNumeric(v)) {
      return failure(
        EstimatorError.invalidArgument(
          `sample element at index ${i} is not numeric (${typeof v})`,
        ),
      );
    }
    const rounded = toPrecision(v, precision);
    if (Number.isFinite(v) && !Number.isFinite(rounded)) {
      return failure(
        EstimatorError.invalidArgument(
          `sample element at index ${i} (${v}) overflows single precision; set highPrecision to keep it`,
        ),
      );
    }
    values[i] = rounded;
  }

  const range = options.validRange;
  let working: number[];
  if (range !== undefined) {
    const [lo, hi] = range;
    if (
      !isNumeric(lo) ||
      !isNumeric(hi) ||
      Number.isNaN(lo) ||
      Number.isNaN(hi)
    ) {
      return failure(
        EstimatorError.invalidArgument(
          `validRange bounds must be numbers, got [${String(lo)}, ${String(hi)}]`,
        ),
      );
    }
    if (lo > hi) {
      return failure(
        EstimatorError.invalidArgument(
          `validRange lower bound ${lo} exceeds upper bound ${hi}`,
        ),
      );
    }
    const lower = toPrecision(lo, precision);
    const upper = toPrecision(hi, precision);
    working = values.filter(
      (v) => Number.isFinite(v) && v >= lower && v <= upper,
    );
  } else {
    const bad = values.findIndex((v) => !Number.isFinite(v));
    if (bad >= 0) {
      return failure(
        EstimatorError.invalidArgument(
          `sample element at index ${bad} is not finite (${values[bad]}); pass a validRange to treat it as missing`,
        ),
      );
    }
    working = values;
  }

  if (working.length < MIN_SAMPLE_SIZE) {
    return failure(
      EstimatorError.insufficientData(
        `need at least ${MIN_SAMPLE_SIZE} valid values, got ${working.length}`,
      ),
      working.length,
    );
  }

  // `values` is already a private copy, so a pre-sorted sample can be used as is.
  const skipSort = range === undefined && (options.preSorted ?? false);
  return {
    ok: true,
    value: { sorted: skipSort ? working : sortedCopy(working), precision },
  };
}

/**
 * Value at fraction `p` of an ascending sample, using the 1-based rank
 * r = p * (n + 1):
 * - r < 1        → minimum
 * - r > n        → maximum
 * - r integral   → sorted[r - 1]
 * - otherwise    → linear interpolation between sorted[k - 1] and sorted[k], k = floor(r)
 *
 * All arithmetic is rounded to `precision` at every step.
 */
function thresholdAt(
  sorted: number[],
  p: number,
  precision: Precision,
): number {
  const n = sorted.length;
  const rank = toPrecision(toPrecision(p, precision) * (n + 1), precision);

  if (rank < 1) return sorted[0];
  if (rank > n) return sorted[n - 1];

  const k = Math.floor(rank);
  const lo = sorted[k - 1];
  if (rank === k) return lo;

  const hi = sorted[k];
  if (lo === hi) return lo;

  const frac = toPrecision(rank - k, precision);
  const span = toPrecision(hi - lo, precision);
  const t = toPrecision(lo + toPrecision(frac * span, precision), precision);
  // rounding can overshoot by an ulp
  return Math.min(Math.max(t, lo), hi);
}

function summarize(working: WorkingSample, p: number): PercentileResult {
  const { sorted, precision } = working;
  return {
    threshold: thresholdAt(sorted, p, precision),
    validMin: sorted[0],
    validMax: sorted[sorted.length - 1],
    validCount: sorted.length,
  };
}

/**
 * Estimate the `percentile` (fraction in [0, 1]) of `sample`.
 *
 * When `options.validRange` is set, values outside the inclusive range (and
 * non-finite values) are treated as missing and ignored. The sample is never
 * mutated. Failures are returned, not thrown.
 */
export function estimate(
  sample: Sample,
  percentile: number,
  options: EstimateOptions = {},
): Result<PercentileResult> {
  const bad = checkPercentile(percentile);
  if (bad) return failure(bad);

  const working = prepare(sample, options);
  if (!working.ok) return working;

  return { ok: true, value: summarize(working.value, percentile) };
}

/**
 * Estimate several percentiles of the same sample, filtering and sorting it
 * only once. Results are returned in the order of `percentiles`.
 */
export function estimateMany(
  sample: Sample,
  percentiles: readonly number[],
  options: EstimateOptions = {},
): Result<PercentileResult[]> {
  if (percentiles.length === 0) {
    return failure(
      EstimatorError.invalidArgument("at least one percentile is required"),
    );
  }
  for (const p of percentiles) {
    const bad = checkPercentile(p);
    if (bad) return failure(bad);
  }

  const working = prepare(sample, options);
  if (!working.ok) return working;

  const prepared = working.value;
  return { ok: true, value: percentiles.map((p) => summarize(prepared, p)) };
}

// Like `estimate`, but throws the EstimatorError on failure.
export function estimateOrThrow(
  sample: Sample,
  percentile: number,
  options: EstimateOptions = {},
): PercentileResult {
  const result = estimate(sample, percentile, options);
  if (!result.ok) throw result.error;
  return result.value;
}

export const median = (
  sample: Sample,
  options: EstimateOptions = {},
): Result<PercentileResult> => estimate(sample, 0.5, options);
