/**
 * Population statistics (divide by N, not N - 1)
 */

export function mean(values: readonly number[]): number {
  if (values.length === 0) return NaN;
  let sum = 0;
  for (const value of values) {
    sum += value;
  }
  return sum / values.length;
}

export function populationStd(values: readonly number[]): number {
  if (values.length === 0) return NaN;
  const center = mean(values);
  let squares = 0;
  for (const value of values) {
    squares += (value - center) ** 2;
  }
  return Math.sqrt(squares / values.length);
}

/**
 * [mean, std] of a pooled sample set
 */
export function summarize(values: readonly number[]): [number, number] {
  return [mean(values), populationStd(values)];
}
