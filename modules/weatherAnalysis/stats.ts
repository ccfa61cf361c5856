export function nonNull(values: ReadonlyArray<number | null>): number[] {
  const out: number[] = [];
  for (const v of values) if (v !== null) out.push(v);
  return out;
}

export function mean(values: ReadonlyArray<number>): number {
  if (values.length === 0) return NaN;
  let sum = 0;
  for (const v of values) sum += v;
  return sum / values.length;
}

export function median(values: ReadonlyArray<number>): number {
  if (values.length === 0) return NaN;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 1 ? sorted[mid] : (sorted[mid - 1] + sorted[mid]) / 2;
}

/** Sample standard deviation (n - 1 denominator); NaN below two values. */
export function sampleStd(values: ReadonlyArray<number>): number {
  if (values.length < 2) return NaN;
  const avg = mean(values);
  let ss = 0;
  for (const v of values) ss += (v - avg) ** 2;
  return Math.sqrt(ss / (values.length - 1));
}

export function minOf(values: ReadonlyArray<number>): number {
  let out = Infinity;
  for (const v of values) if (v < out) out = v;
  return values.length ? out : NaN;
}

export function maxOf(values: ReadonlyArray<number>): number {
  let out = -Infinity;
  for (const v of values) if (v > out) out = v;
  return values.length ? out : NaN;
}

/** Pearson r over index pairs where both sides are present. */
export function pearson(xs: ReadonlyArray<number | null>, ys: ReadonlyArray<number | null>): number {
  const a: number[] = [];
  const b: number[] = [];
  const len = Math.min(xs.length, ys.length);
  for (let i = 0; i < len; i++) {
    const x = xs[i];
    const y = ys[i];
    if (x === null || y === null) continue;
    a.push(x);
    b.push(y);
  }
  if (a.length < 2) return NaN;

  const ma = mean(a);
  const mb = mean(b);
  let cov = 0;
  let va = 0;
  let vb = 0;
  for (let i = 0; i < a.length; i++) {
    const da = a[i] - ma;
    const db = b[i] - mb;
    cov += da * db;
    va += da * da;
    vb += db * db;
  }
  if (va === 0 || vb === 0) return NaN;
  return cov / Math.sqrt(va * vb);
}
