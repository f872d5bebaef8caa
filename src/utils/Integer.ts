export function abs(value: bigint): bigint {
    return value < 0n ? -value : value;
}

export function gcd(a: bigint, b: bigint): bigint {
    let x = abs(a);
    let y = abs(b);

    while (y !== 0n) [x, y] = [y, x % y];
    return x;
}

export function wrap(value: bigint, bits: number): bigint {
    return BigInt.asIntN(bits, value);
}

// Reduced pair with the sign carried by the numerator. (0, 0) has no divisor to reduce by and is returned as is.
export function canonicalize(numerator: bigint, denominator: bigint, bits: number): [bigint, bigint] {
    const divisor = gcd(numerator, denominator);
    if (divisor === 0n) return [0n, 0n];

    const signedDivisor = denominator < 0n ? -divisor : divisor;
    const reduced = abs(denominator) / divisor;

    // A magnitude of 2^(bits - 1) has no positive encoding, so the largest one stands in for it.
    const max = (1n << BigInt(bits - 1)) - 1n;
    if (reduced > max) return canonicalize(wrap(numerator / signedDivisor, bits), max, bits);

    return [wrap(numerator / signedDivisor, bits), reduced];
}

export function root(value: bigint, degree: number): bigint {
    if (value <= 0n) return 0n;

    const exponent = BigInt(degree);
    let candidate = BigInt(Math.floor(Math.pow(Number(value), 1 / degree)));

    while (candidate > 0n && candidate ** exponent > value) candidate--;
    while ((candidate + 1n) ** exponent <= value) candidate++;

    return candidate;
}
