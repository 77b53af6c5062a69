/**
 * Decimal helpers for money arithmetic in the trading game
 * Amounts travel as strings between steps so that repeated additions do not
 * accumulate binary floating point error
 */
import BigNumber from "bignumber.js";

/**
 * Converts a number to string while preserving its original precision
 * Removes trailing zeros and unnecessary decimal points
 */
export function numberToString(num: number): string {
  let str = num.toString();

  // Handle scientific notation
  if (str.includes('e')) {
    str = num.toFixed(20);
  }

  if (str.includes('.')) {
    str = str.replace(/\.?0+$/, '');
  }

  if (str === '' || str === '-0') {
    return '0';
  }

  return str;
}

export function addStrings(a: string, b: string): string {
  return new BigNumber(a).plus(b).toString();
}

export function subtractStrings(a: string, b: string): string {
  return new BigNumber(a).minus(b).toString();
}

export function multiplyStrings(a: string, b: string): string {
  return new BigNumber(a).multipliedBy(b).toString();
}

/**
 * Divides with bignumber.js defaults (20 decimal places, half-up rounding)
 */
export function divideStrings(a: string, b: string): string {
  return new BigNumber(a).dividedBy(b).toString();
}

/**
 * Comparator over decimal strings, usable as a tree ordering
 */
export function compareStrings(a: string, b: string): number {
  const numA = new BigNumber(a);
  if (numA.isLessThan(b)) return -1;
  if (numA.isGreaterThan(b)) return 1;
  return 0;
}

export function isPositive(a: string): boolean {
  return new BigNumber(a).isGreaterThan(0);
}
