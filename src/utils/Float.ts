const MAX_EXPONENT: number = 1023;
const MIN_EXPONENT: number = -1022;

export function modf(float: number): [number, number] {
    const int = Math.trunc(float);
    if (!Number.isFinite(float)) return [int, Number.isNaN(float) ? NaN : 0 * Math.sign(float)];

    return [int, float - int];
}

export function ldexp(float: number, exponent: number): number {
    let result: number = float;

    for (; exponent > MAX_EXPONENT; exponent -= MAX_EXPONENT) result *= 2 ** MAX_EXPONENT;
    for (; exponent < MIN_EXPONENT; exponent -= MIN_EXPONENT) result *= 2 ** MIN_EXPONENT;

    return result * 2 ** exponent;
}

export function frexp(float: number): [number, number] {
    if (float === 0 || !Number.isFinite(float)) return [float, 0];

    let exponent = Math.floor(Math.log2(Math.abs(float))) + 1;
    let mantissa = ldexp(float, -exponent);

    for (; Math.abs(mantissa) < 0.5; exponent--) mantissa *= 2;
    for (; Math.abs(mantissa) >= 1; exponent++) mantissa /= 2;

    return [mantissa, exponent];
}
