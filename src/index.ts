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

export {
  estimate,
  estimateMany,
  estimateOrThrow,
  median,
  MIN_SAMPLE_SIZE,
} from "./lib/stats/percentile";
export { EstimatorError, type EstimatorErrorKind } from "./lib/stats/errors";
export { ascending, sortedCopy } from "./lib/alg/stablesort";
export {
  flattenSample,
  isNumeric,
  precisionOf,
  toPrecision,
  type Precision,
} from "./lib/numeric";
export type {
  EstimateOptions,
  PercentileResult,
  Result,
  Sample,
  ValidRange,
} from "./lib/types";
