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

// Numeric element check applied at the sample boundary. Only real JS numbers
// pass; bigints, numeric strings and boxed values are rejected rather than
// coerced. NaN and the infinities are numbers here; whether they count as
// observations is up to the caller.
export const isNumeric = (value: unknown): value is number =>
  typeof value === "number";

function isArrayLike(value: unknown): value is ArrayLike<unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    "length" in value &&
    typeof value.length === "number"
  );
}

// Flatten a (possibly nested) sample depth-first into a fresh array.
// Arrays, typed arrays and other array-likes are descended into; anything
// else is a leaf. A bare leaf at the top level yields a one-element list.
export function flattenSample(sample: unknown): unknown[] {
  const out: unknown[] = [];
  const walk = (node: unknown): void => {
    if (!isArrayLike(node)) {
      out.push(node);
      return;
    }
    for (let i = 0; i < node.length; i++) walk(node[i]);
  };
  walk(sample);
  return out;
}

export type Precision = "single" | "double";

export const precisionOf = (highPrecision: boolean): Precision =>
  highPrecision ? "double" : "single";

// Round a value to the given precision. Every intermediate result of the
// estimator goes through this so single precision is applied consistently.
export function toPrecision(x: number, precision: Precision): number {
  return precision === "single" ? Math.fround(x) : x;
}

