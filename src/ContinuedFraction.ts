import { Fraction } from "./Fraction";
import { FractionConfig } from "./FractionConfig";
import { Float } from "./utils";

/**
 * Partial quotients `a0, a1, ...` of `float`, always `config.maxTerms` long.
 *
 * Expansion stops once the fractional remainder drops below `config.error`; the remaining terms stay zero.
 */
export function expand(float: number, config: FractionConfig = FractionConfig.default): bigint[] {
    const terms: bigint[] = new Array<bigint>(config.maxTerms).fill(0n);
    let remainder: number = float;

    for (let i: number = 0; i < terms.length; i++, remainder = 1 / remainder) {
        const [int, frac] = Float.modf(remainder);

        terms[i] = config.toInteger(int);
        remainder = frac;

        if (Math.abs(remainder) < config.error) break;
    }

    return terms;
}

/** Evaluates `a0 + 1/(a1 + 1/(a2 + ...))`, skipping trailing zero terms. */
export function reconstruct(terms: readonly bigint[], config: FractionConfig = FractionConfig.default): Fraction {
    const { zero } = Fraction.constantsOf(config);

    return terms.reduceRight<Fraction>((acc, term) => acc.numerator === 0n ? new Fraction(term, 1n, config) : acc.inverse().add(term), zero);
}

export function approximate(float: number, config: FractionConfig = FractionConfig.default): Fraction {
    return reconstruct(expand(float, config), config);
}

export function format(terms: readonly bigint[]): string {
    let last: number = terms.length - 1;
    while (last > 0 && terms[last] === 0n) last--;

    return terms.slice(0, last + 1).join(",");
}
