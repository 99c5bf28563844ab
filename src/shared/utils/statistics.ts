import * as math from 'mathjs';

const MAX_ITERATIONS = 500;
const EPSILON = 1e-14;
const FPMIN = 1e-300;

export function mean(values: number[]): number {
    return Number(math.mean(values));
}

/** Population variance (no Bessel correction). */
export function populationVariance(values: number[]): number {
    const mu = mean(values);
    return mean(values.map(val => Math.pow(val - mu, 2)));
}

function lowerGammaSeries(a: number, x: number, logGammaA: number): number {
    let ap = a;
    let sum = 1 / a;
    let del = sum;
    for (let n = 0; n < MAX_ITERATIONS; n++) {
        ap += 1;
        del *= x / ap;
        sum += del;
        if (Math.abs(del) < Math.abs(sum) * EPSILON) break;
    }
    return sum * Math.exp(-x + a * Math.log(x) - logGammaA);
}

// Lentz's continued fraction for Q(a, x); converges quickly for x >= a + 1.
function upperGammaContinuedFraction(a: number, x: number, logGammaA: number): number {
    let b = x + 1 - a;
    let c = 1 / FPMIN;
    let d = 1 / b;
    let h = d;
    for (let i = 1; i <= MAX_ITERATIONS; i++) {
        const an = -i * (i - a);
        b += 2;
        d = an * d + b;
        if (Math.abs(d) < FPMIN) d = FPMIN;
        c = b + an / c;
        if (Math.abs(c) < FPMIN) c = FPMIN;
        d = 1 / d;
        const del = d * c;
        h *= del;
        if (Math.abs(del - 1) < EPSILON) break;
    }
    return Math.exp(-x + a * Math.log(x) - logGammaA) * h;
}

/** Regularized upper incomplete gamma function Q(a, x). */
export function regularizedUpperGamma(a: number, x: number): number {
    if (a <= 0) throw new Error(`Gamma shape must be positive, got ${a}`);
    if (x <= 0) return 1;

    const logGammaA = Number(math.lgamma(a));
    if (x < a + 1) {
        return 1 - lowerGammaSeries(a, x, logGammaA);
    }
    return upperGammaContinuedFraction(a, x, logGammaA);
}

/** P(X >= statistic) for a chi-square distribution with the given degrees of freedom. */
export function chiSquareSurvival(statistic: number, degreesOfFreedom: number): number {
    return regularizedUpperGamma(degreesOfFreedom / 2, statistic / 2);
}
