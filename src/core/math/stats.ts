export function sum(values: readonly number[]): number {
  let total = 0;
  for (const v of values) total += v;
  return total;
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) return NaN;
  return sum(values) / values.length;
}

/**
 * Successive differences: out[i] = values[i + 1] - values[i].
 */
export function differences(values: readonly number[]): number[] {
  const out: number[] = [];
  for (let i = 0; i + 1 < values.length; i++) {
    out.push(values[i + 1] - values[i]);
  }
  return out;
}

/**
 * Smallest and largest value; [Infinity, -Infinity] when empty.
 */
export function extent(values: readonly number[]): [number, number] {
  let min = Infinity;
  let max = -Infinity;
  for (const v of values) {
    if (v < min) min = v;
    if (v > max) max = v;
  }
  return [min, max];
}

export function range(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const [min, max] = extent(values);
  return max - min;
}

export function allEqual(values: readonly number[]): boolean {
  return values.every((v) => v === values[0]);
}
