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

import type { EstimatorError } from "@/lib/stats/errors";

// A numeric sample. Nested arrays are treated as multi-dimensional data and
// flattened in row-major order.
export type Sample = ArrayLike<number> | readonly Sample[];

// Inclusive [lower, upper] interval separating real observations from
// missing-value sentinels. Use -Infinity / Infinity for one-sided ranges.
export type ValidRange = readonly [lower: number, upper: number];

export interface EstimateOptions {
  // Values outside this range are treated as missing. Omit to disable filtering.
  validRange?: ValidRange;
  // Skip sorting when the sample is already ascending. Ignored when filtering.
  preSorted?: boolean;
  // Use double precision throughout. Default: single precision.
  highPrecision?: boolean;
}

export interface PercentileResult {
  threshold: number;
  validMin: number;
  validMax: number;
  validCount: number;
}

export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; error: EstimatorError; result: PercentileResult };
