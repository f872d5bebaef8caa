import { FractionConfig } from "./FractionConfig";
import { Ordering } from "./types";
import { Complex, Float, Integer, sternBrocot } from "./utils";

export type Operand = Fraction | bigint | number;

export interface FractionConstants {
    zero: Fraction;
    one: Fraction;
    infinity: Fraction;
}

const constants = new WeakMap<FractionConfig, FractionConstants>();

/**
 * Exact ratio of two fixed-width integers, kept reduced with the sign on the numerator.
 *
 * A zero denominator is a valid value (`1/0` or `-1/0`), and no operation throws: degenerate
 * inputs come back as the infinity sentinel or as the receiver itself.
 */
export class Fraction {
    static readonly zero = new Fraction(0n, 1n);
    static readonly one = new Fraction(1n, 1n);
    static readonly infinity = new Fraction(1n, 0n);

    readonly numerator: bigint;
    readonly denominator: bigint;

    readonly initialNumerator: bigint;
    readonly initialDenominator: bigint;

    constructor(numerator: bigint, denominator: bigint = 1n, readonly config: FractionConfig = FractionConfig.default) {
        this.initialNumerator = numerator;
        this.initialDenominator = denominator;

        [this.numerator, this.denominator] = config.canonicalize(numerator, denominator);
    }

    get error(): number {
        return this.config.error;
    }

    get constants(): FractionConstants {
        return Fraction.constantsOf(this.config);
    }

    static constantsOf(config: FractionConfig): FractionConstants {
        if (config === FractionConfig.default) return Fraction;

        let set = constants.get(config);
        if (!set) {
            set = {
                zero: new Fraction(0n, 1n, config),
                one: new Fraction(1n, 1n, config),
                infinity: new Fraction(1n, 0n, config)
            };

            constants.set(config, set);
        }

        return set;
    }

    static from(value: Operand, config?: FractionConfig): Fraction {
        switch (typeof value) {
            case "bigint": return new Fraction(value, 1n, config);
            case "number": return Fraction.fromNumber(value, config);

            default: return !config || config === value.config ? value : new Fraction(value.numerator, value.denominator, config);
        }
    }

    /** Stern-Brocot approximation of `float` within `config.error`. */
    static fromNumber(float: number, config: FractionConfig = FractionConfig.default): Fraction {
        const [numerator, denominator] = sternBrocot(float, config);
        return new Fraction(numerator, denominator, config);
    }

    static mediant(a: Fraction, b: Fraction): Fraction {
        return a.#of(a.numerator + b.numerator, a.denominator + b.denominator);
    }

    static average(...fractions: Fraction[]): Fraction {
        if (!fractions.length) return Fraction.zero;

        const sum = fractions.reduceRight((acc, fraction) => fraction.add(acc));
        return sum.div(BigInt(fractions.length));
    }

    static compare(a: Fraction, b: Fraction): number {
        return a.compare(b);
    }

    toNumber(): number {
        return Number(this.numerator) / Number(this.denominator);
    }

    isInt(): boolean {
        return this.denominator === 1n;
    }

    isNeg(): boolean {
        return this.numerator < 0n;
    }

    isAbsSquare(): boolean {
        const { numerator, denominator, config } = this;
        const root = this.#of(config.toInteger(Math.sqrt(Number(Integer.abs(numerator)))), config.toInteger(Math.sqrt(Number(denominator))));

        return this.abs().equals(root.square());
    }

    isCube(): boolean {
        const { numerator, denominator, config } = this;
        const root = this.#of(config.toInteger(Math.cbrt(Number(numerator))), config.toInteger(Math.cbrt(Number(denominator))));

        return this.equals(root.cube());
    }

    abs(): Fraction {
        return this.#of(Integer.abs(this.numerator), this.denominator);
    }

    inverse(): Fraction {
        return this.#of(this.denominator, this.numerator);
    }

    negate(): Fraction {
        return this.#of(-this.numerator, this.denominator);
    }

    add(rhs: Operand): Fraction {
        const { numerator, denominator } = this;

        switch (typeof rhs) {
            case "bigint": return this.#of(numerator + denominator * rhs, denominator);
            case "number": return denominator === 0n ? this : this.#approximate(this.toNumber() + rhs);

            default: return this.#of(numerator * rhs.denominator + denominator * rhs.numerator, denominator * rhs.denominator);
        }
    }

    sub(rhs: Operand): Fraction {
        switch (typeof rhs) {
            case "bigint":
            case "number": return this.add(-rhs);

            default: return this.add(rhs.negate());
        }
    }

    mul(rhs: Operand): Fraction {
        const { numerator, denominator } = this;

        switch (typeof rhs) {
            case "bigint": return this.#of(numerator * rhs, denominator);
            case "number": return denominator === 0n ? this : this.#approximate(this.toNumber() * rhs);

            default: return this.#of(numerator * rhs.numerator, denominator * rhs.denominator);
        }
    }

    div(rhs: Operand): Fraction {
        const { numerator, denominator } = this;

        switch (typeof rhs) {
            case "bigint": return this.#of(numerator, denominator * rhs);
            case "number": return denominator === 0n ? this : this.#approximate(this.toNumber() / rhs);

            default: return this.#of(numerator * rhs.denominator, denominator * rhs.numerator);
        }
    }

    /** `this - trunc(this / rhs) * rhs`, or the infinity sentinel when that quotient is undefined. A float divisor uses the float remainder instead. */
    mod(rhs: Operand): Fraction {
        const { denominator, config } = this;

        switch (typeof rhs) {
            case "bigint": {
                if (denominator === 0n || rhs === 0n) return this.constants.infinity;

                const quotient = config.toInteger(Math.trunc(this.div(rhs).toNumber()));
                return this.sub(config.wrap(quotient * rhs));
            }

            case "number": return denominator === 0n ? this : this.#approximate(this.toNumber() % rhs);

            default: {
                if (rhs.numerator === 0n || rhs.denominator === 0n || denominator === 0n) return this.constants.infinity;

                const quotient = config.toInteger(Math.trunc(this.div(rhs).toNumber()));
                return this.sub(rhs.mul(quotient));
            }
        }
    }

    increment(): Fraction {
        return this.#of(this.numerator + this.denominator, this.denominator);
    }

    decrement(): Fraction {
        return this.#of(this.numerator - this.denominator, this.denominator);
    }

    equals(rhs: Fraction): boolean {
        return this.numerator === rhs.numerator && this.denominator === rhs.denominator;
    }

    // Cross products are wrapped like any other product, so large operands can compare wrongly.
    compare(rhs: Fraction): Ordering {
        const { config } = this;

        const lhsProduct = config.wrap(this.numerator * rhs.denominator);
        const rhsProduct = config.wrap(rhs.numerator * this.denominator);

        if (lhsProduct < rhsProduct) return Ordering.Less;
        return lhsProduct > rhsProduct ? Ordering.Greater : Ordering.Equal;
    }

    lessThan(rhs: Fraction): boolean {
        return this.compare(rhs) === Ordering.Less;
    }

    lessThanOrEqual(rhs: Fraction): boolean {
        return this.compare(rhs) !== Ordering.Greater;
    }

    greaterThan(rhs: Fraction): boolean {
        return this.compare(rhs) === Ordering.Greater;
    }

    greaterThanOrEqual(rhs: Fraction): boolean {
        return this.compare(rhs) !== Ordering.Less;
    }

    square(): Fraction {
        return this.mul(this);
    }

    cube(): Fraction {
        return this.mul(this).mul(this);
    }

    #isPowUndefined(exponent: number): boolean {
        return (exponent < 0 && this.numerator === 0n) || (exponent >= 0 && this.denominator === 0n);
    }

    /** Negative bases with fractional exponents give `NaN`, which approximates to zero. */
    pow(exponent: number): Fraction {
        if (this.#isPowUndefined(exponent)) return this;
        return this.#approximate(Math.pow(this.toNumber(), exponent));
    }

    powC(exponent: number): readonly [Fraction, Fraction] {
        if (this.#isPowUndefined(exponent)) return [this, this.constants.zero];

        const { re, im } = Complex.pow(this.toNumber(), exponent);
        return [this.#approximate(re), this.#approximate(im)];
    }

    sqrt(): Fraction {
        return this.denominator === 0n ? this : this.#approximate(Math.sqrt(this.toNumber()));
    }

    sqrtC(): readonly [Fraction, Fraction] {
        if (this.denominator === 0n) return [this, this.constants.zero];

        const { re, im } = Complex.sqrt(this.toNumber());
        return [this.#approximate(re), this.#approximate(im)];
    }

    cbrt(): Fraction {
        return this.denominator === 0n ? this : this.#approximate(Math.cbrt(this.toNumber()));
    }

    /** e.g. `48/7` → `[6/7, 3]`, `1/4` → `[1/2, -1]`. */
    frexp(): readonly [Fraction, number] {
        if (this.denominator === 0n) return [this, 0];

        const [mantissa, exponent] = Float.frexp(this.toNumber());
        return [this.#approximate(mantissa), exponent];
    }

    ldexp(exponent: number): Fraction {
        return this.denominator === 0n ? this : this.#approximate(Float.ldexp(this.toNumber(), exponent));
    }

    /**
     * Splits the largest `root`-th powers out of the numerator and the denominator.
     *
     * Returns `[factor, remainder]` with `factor ** root * remainder` equal to this fraction,
     * e.g. `simplifyRoot(2)` of `56/45` is `[2/3, 14/5]`. When nothing can be extracted the
     * result is `[1, this]`.
     */
    simplifyRoot(root: number): readonly [Fraction, Fraction] {
        const { one } = this.constants;
        if (!Number.isInteger(root) || root < 1) return [one, this];

        const [numFactor, numRemain] = this.#extractPower(this.numerator, root);
        const [denFactor, denRemain] = this.#extractPower(this.denominator, root);

        if (numFactor > 1n || denFactor > 1n) return [this.#of(numFactor, denFactor), numRemain.div(denRemain)];
        return [one, this];
    }

    simplifySqrt(): readonly [Fraction, Fraction] {
        return this.simplifyRoot(2);
    }

    simplifyCbrt(): readonly [Fraction, Fraction] {
        return this.simplifyRoot(3);
    }

    #extractPower(value: bigint, root: number): [bigint, Fraction] {
        const exponent = BigInt(root);

        let factor: bigint = Integer.root(Integer.abs(value), root);
        let remain: Fraction = this.#of(value);

        for (; factor !== 0n; factor--) {
            remain = this.#of(value, factor ** exponent);
            if (remain.denominator === 1n) break;
        }

        return [factor === 0n ? 1n : factor, remain];
    }

    toString(): string {
        const { numerator, denominator } = this;

        if (!this.isInt()) return `(${numerator}/${denominator})`;
        return this.isNeg() ? `(${numerator})` : `${numerator}`;
    }

    #of(numerator: bigint, denominator: bigint = 1n): Fraction {
        return new Fraction(numerator, denominator, this.config);
    }

    #approximate(float: number): Fraction {
        return Fraction.fromNumber(float, this.config);
    }
}

/** Named stand-in for a fraction literal: integers become `k/1`, floats are approximated. */
export function frac(value: bigint | number, config?: FractionConfig): Fraction {
    return Fraction.from(value, config);
}
