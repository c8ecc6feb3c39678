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

export type EstimatorErrorKind = "InvalidArgument" | "InsufficientData";

// Raised (or returned inside a failed Result) when a percentile cannot be
// estimated from the given input.
export class EstimatorError extends Error {
  readonly kind: EstimatorErrorKind;

  constructor(kind: EstimatorErrorKind, message: string) {
    super(message);
    this.name = "EstimatorError";
    this.kind = kind;
  }

  static invalidArgument(message: string): EstimatorError {
    return new EstimatorError("InvalidArgument", message);
  }

  static insufficientData(message: string): EstimatorError {
    return new EstimatorError("InsufficientData", message);
  }
}
