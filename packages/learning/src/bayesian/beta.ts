/**
 * Beta Distribution
 *
 * Mean, variance, CDF and quantile of Beta(a, b). The CDF is the
 * regularized incomplete beta function (Lanczos log-gamma plus a
 * continued fraction); the quantile inverts it by bisection.
 *
 * @module bayesian/beta
 */

const LANCZOS = [
  676.5203681218851, -1259.1392167224028, 771.32342877765313,
  -176.61502916214059, 12.507343278686905, -0.13857109526572012,
  9.9843695780195716e-6, 1.5056327351493116e-7,
];

export function logGamma(z: number): number {
  if (z < 0.5) {
    // Reflection formula
    return Math.log(Math.PI) - Math.log(Math.sin(Math.PI * z)) - logGamma(1 - z);
  }

  const zm1 = z - 1;
  let x = 0.99999999999980993;
  LANCZOS.forEach((coefficient, i) => {
    x += coefficient / (zm1 + i + 1);
  });
  const t = zm1 + LANCZOS.length - 0.5;
  return 0.5 * Math.log(2 * Math.PI) + (zm1 + 0.5) * Math.log(t) - t + Math.log(x);
}

/**
 * Continued fraction for the incomplete beta function (modified Lentz)
 */
function betaContinuedFraction(a: number, b: number, x: number): number {
  const MAX_ITERATIONS = 300;
  const EPSILON = 3e-14;
  const FP_MIN = 1e-300;

  const qab = a + b;
  const qap = a + 1;
  const qam = a - 1;
  let c = 1;
  let d = 1 - (qab * x) / qap;
  if (Math.abs(d) < FP_MIN) d = FP_MIN;
  d = 1 / d;
  let h = d;

  for (let m = 1; m <= MAX_ITERATIONS; m++) {
    const m2 = 2 * m;
    let aa = (m * (b - m) * x) / ((qam + m2) * (a + m2));
    d = 1 + aa * d;
    if (Math.abs(d) < FP_MIN) d = FP_MIN;
    c = 1 + aa / c;
    if (Math.abs(c) < FP_MIN) c = FP_MIN;
    d = 1 / d;
    h *= d * c;

    aa = (-(a + m) * (qab + m) * x) / ((a + m2) * (qap + m2));
    d = 1 + aa * d;
    if (Math.abs(d) < FP_MIN) d = FP_MIN;
    c = 1 + aa / c;
    if (Math.abs(c) < FP_MIN) c = FP_MIN;
    d = 1 / d;
    const delta = d * c;
    h *= delta;

    if (Math.abs(delta - 1) < EPSILON) break;
  }

  return h;
}

/**
 * I_x(a, b), the CDF of Beta(a, b) at x
 */
export function regularizedIncompleteBeta(x: number, a: number, b: number): number {
  if (x <= 0) return 0;
  if (x >= 1) return 1;

  const logFront =
    logGamma(a + b) - logGamma(a) - logGamma(b) + a * Math.log(x) + b * Math.log(1 - x);
  const front = Math.exp(logFront);

  // The continued fraction converges fastest below the mean
  if (x < (a + 1) / (a + b + 2)) {
    return (front * betaContinuedFraction(a, b, x)) / a;
  }
  return 1 - (front * betaContinuedFraction(b, a, 1 - x)) / b;
}

/**
 * Inverse CDF of Beta(a, b)
 */
export function betaQuantile(p: number, a: number, b: number): number {
  if (p <= 0) return 0;
  if (p >= 1) return 1;

  let lo = 0;
  let hi = 1;
  for (let i = 0; i < 100; i++) {
    const mid = (lo + hi) / 2;
    if (regularizedIncompleteBeta(mid, a, b) < p) {
      lo = mid;
    } else {
      hi = mid;
    }
    if (hi - lo < 1e-15) break;
  }
  return (lo + hi) / 2;
}

export function betaMean(a: number, b: number): number {
  return a / (a + b);
}

export function betaVariance(a: number, b: number): number {
  return (a * b) / ((a + b) ** 2 * (a + b + 1));
}

/**
 * Equal-tailed credible interval
 */
export function betaCredibleInterval(
  a: number,
  b: number,
  mass = 0.95
): { low: number; high: number } {
  const tail = (1 - mass) / 2;
  return {
    low: betaQuantile(tail, a, b),
    high: betaQuantile(1 - tail, a, b),
  };
}
