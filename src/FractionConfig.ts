import { DEFAULT_FRACTION_OPTIONS, MAX_BITS, MIN_BITS, type FractionOptions } from "./types";
import { Integer } from "./utils";

/**
 * Storage width and approximation settings shared by every fraction built with it.
 *
 * Integer results are wrapped to `bits` in two's complement, so overflow is silent.
 */
export class FractionConfig {
    static readonly default = new FractionConfig();

    readonly bits: number;
    readonly errorExponent: number;

    readonly maxTerms: number;
    readonly maxIterations: number;

    readonly error: number;

    readonly min: bigint;
    readonly max: bigint;

    constructor(options: Partial<FractionOptions> = {}) {
        const {
            bits = DEFAULT_FRACTION_OPTIONS.bits,
            errorExponent = DEFAULT_FRACTION_OPTIONS.errorExponent,

            maxTerms = DEFAULT_FRACTION_OPTIONS.maxTerms,
            maxIterations = DEFAULT_FRACTION_OPTIONS.maxIterations
        } = options;

        if (!Number.isInteger(bits) || bits < MIN_BITS || bits > MAX_BITS) throw new Error(`Invalid storage width: ${bits}. Expected an integer from ${MIN_BITS} to ${MAX_BITS}.`);
        if (!Number.isInteger(errorExponent) || errorExponent >= 0) throw new Error(`Invalid error exponent: ${errorExponent}. Expected a negative integer.`);

        if (!Number.isInteger(maxTerms) || maxTerms < 1) throw new Error(`Invalid continued fraction length: ${maxTerms}.`);
        if (!Number.isInteger(maxIterations) || maxIterations < 1) throw new Error(`Invalid iteration cap: ${maxIterations}.`);

        this.bits = bits;
        this.errorExponent = errorExponent;

        this.maxTerms = maxTerms;
        this.maxIterations = maxIterations;

        this.error = Number(`1e${errorExponent}`);

        this.min = -(1n << BigInt(bits - 1));
        this.max = (1n << BigInt(bits - 1)) - 1n;
    }

    wrap(value: bigint): bigint {
        return Integer.wrap(value, this.bits);
    }

    canonicalize(numerator: bigint, denominator: bigint): [bigint, bigint] {
        return Integer.canonicalize(this.wrap(numerator), this.wrap(denominator), this.bits);
    }

    /** Truncates toward zero. Values the storage type cannot hold, NaN included, become {@link min}. */
    toInteger(float: number): bigint {
        if (!Number.isFinite(float)) return this.min;

        const int = BigInt(Math.trunc(float));
        return int < this.min || int > this.max ? this.min : int;
    }

    equals(other: FractionConfig): boolean {
        return this === other || (this.bits === other.bits && this.errorExponent === other.errorExponent && this.maxTerms === other.maxTerms && this.maxIterations === other.maxIterations);
    }
}
