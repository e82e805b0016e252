export function clamp(x: number, lo: number, hi: number) {
  return Math.max(lo, Math.min(hi, x));
}

export function mean(xs: number[]) {
  return xs.reduce((a, b) => a + b, 0) / Math.max(1, xs.length);
}

/** Sample standard deviation; 0 for fewer than two values. */
export function sampleStd(xs: number[]) {
  if (xs.length < 2) return 0;
  const m = mean(xs);
  const v = xs.reduce((acc, x) => acc + (x - m) ** 2, 0) / (xs.length - 1);
  return Math.sqrt(v);
}

export function round(x: number, digits: number) {
  const f = 10 ** digits;
  return Math.round(x * f) / f;
}

export function pctChange(from: number, to: number) {
  return from ? ((to - from) / from) * 100 : 0;
}

export function usd(x: number) {
  return `$${Math.round(x)}`;
}
