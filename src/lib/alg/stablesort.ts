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

// Total ascending order on numbers: NaN sorts after everything else so the
// comparator stays consistent even on unfiltered input.
export function ascending(a: number, b: number): number {
  if (a < b) return -1;
  if (a > b) return 1;
  if (a === b) return 0;
  if (Number.isNaN(a)) return Number.isNaN(b) ? 0 : 1;
  return -1;
}

/**
 * Sorted ascending copy of `values`. The input is left untouched.
 * Array.prototype.sort is stable, so equal values keep their input order.
 */
export function sortedCopy(values: readonly number[]): number[] {
  return values.slice().sort(ascending);
}

