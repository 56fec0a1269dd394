/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Fixed-precision number formatting shared by the writers
 */

export const DEFAULT_PRECISION = 6;

/**
 * `toFixed` without negative zero: `-0.0000001` prints as `0.000000`.
 */
export function formatNumber(value: number, precision = DEFAULT_PRECISION): string {
  const text = value.toFixed(precision);
  return /^-0(\.0*)?$/.test(text) ? text.slice(1) : text;
}

/**
 * Round for JSON output. Negative zero becomes zero.
 */
export function roundNumber(value: number, precision = DEFAULT_PRECISION): number {
  const rounded = Number(value.toFixed(precision));
  return rounded === 0 ? 0 : rounded;
}

export function roundVector(values: readonly number[], precision = DEFAULT_PRECISION): number[] {
  return values.map((v) => roundNumber(v, precision));
}
