/**
 * Width of `text` at the active font and size.
 */
export type MeasureFn = (text: string) => number;

/**
 * Find the longest prefix of `text` whose measured width is within `maxWidth`.
 *
 * Probes half the length first and halves while over budget; the last
 * fitting length and the first failing one then bound a bisection. The
 * whole text is assumed not to fit (the caller measured it already), so
 * the number of measurements is O(log n).
 *
 * Returns 0 when not even the first character fits.
 */
export function fitIndex(text: string, maxWidth: number, measure: MeasureFn): number {
  if (maxWidth <= 0 || text.length === 0) {
    return 0;
  }

  let tooLong = text.length;
  let count = Math.floor(text.length / 2);
  while (count > 0 && measure(text.substring(0, count)) > maxWidth) {
    tooLong = count;
    count = Math.floor(count / 2);
  }

  // Reaching zero means a single character is already over budget
  let fits = count;
  if (fits === 0) {
    return 0;
  }

  while (tooLong - fits > 1) {
    const middle = Math.floor((fits + tooLong) / 2);
    if (measure(text.substring(0, middle)) <= maxWidth) {
      fits = middle;
    } else {
      tooLong = middle;
    }
  }
  return fits;
}
