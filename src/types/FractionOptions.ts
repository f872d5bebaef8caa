export interface FractionOptions {
    bits: number;
    errorExponent: number;

    maxTerms: number;
    maxIterations: number;
}

export const DEFAULT_FRACTION_OPTIONS: Readonly<FractionOptions> = {
    bits: 64,
    errorExponent: -6,

    maxTerms: 25,
    maxIterations: 0b1_0000_0000_0000_0000_0000 // 2^20
};

export const MIN_BITS: number = 8;
export const MAX_BITS: number = 1024;
