import { describe, expect, it } from "vitest";

import { Fraction, FractionConfig, frac } from "../../src";
import { Integer } from "../../src/utils";

describe("Fraction", () => {
    describe("construction", () => {
        it("keeps an already reduced fraction", () => {
            const fraction = new Fraction(48n, 7n);

            expect(fraction.toString()).toBe("(48/7)");
            expect(fraction.isInt()).toBe(false);
            expect(fraction.inverse().toString()).toBe("(7/48)");
        });

        it("moves the sign to the numerator and reduces", () => {
            const fraction = new Fraction(4n, -10n);

            expect(fraction.numerator).toBe(-2n);
            expect(fraction.denominator).toBe(5n);

            expect(fraction.initialNumerator).toBe(4n);
            expect(fraction.initialDenominator).toBe(-10n);
        });

        it("collapses a zero denominator to the infinity sentinel", () => {
            expect(new Fraction(2n, 0n).toString()).toBe("(1/0)");
            expect(new Fraction(2n, 0n).isInt()).toBe(false);
            expect(new Fraction(-7n, 0n).toString()).toBe("(-1/0)");
        });

        it("reduces a zero numerator to 0/1", () => {
            const fraction = new Fraction(0n, -5n);

            expect(fraction.numerator).toBe(0n);
            expect(fraction.denominator).toBe(1n);
            expect(fraction.equals(Fraction.zero)).toBe(true);
        });

        it("stores 0/0 as is", () => {
            const fraction = new Fraction(0n, 0n);

            expect(fraction.numerator).toBe(0n);
            expect(fraction.denominator).toBe(0n);
            expect(fraction.toString()).toBe("(0/0)");
            expect(fraction.toNumber()).toBeNaN();
        });

        it("moves the sign off a most negative denominator", () => {
            const min = -(2n ** 63n);
            const max = 2n ** 63n - 1n;

            const fraction = new Fraction(1n, min);
            expect(fraction.numerator).toBe(-1n);
            expect(fraction.denominator).toBe(max);

            const reduced = new Fraction(7n, min);
            expect(reduced.numerator).toBe(-1n);
            expect(reduced.denominator).toBe(max / 7n);
        });

        it("defaults the denominator to one", () => {
            expect(new Fraction(7n).toString()).toBe("7");
            expect(new Fraction(-3n).toString()).toBe("(-3)");
        });

        it("builds from literals with frac", () => {
            expect(frac(7n).toString()).toBe("7");
            expect(frac(0.25).toString()).toBe("(1/4)");
            expect(frac(3.141592654).toString()).toBe("(355/113)");
        });

        it("re-homes a fraction into another config", () => {
            const config = new FractionConfig({ bits: 32 });
            const fraction = Fraction.from(new Fraction(3n, 4n), config);

            expect(fraction.config).toBe(config);
            expect(fraction.toString()).toBe("(3/4)");
        });

        it("leaves every constructed fraction in canonical form", () => {
            const pairs: [bigint, bigint][] = [[12n, 18n], [-12n, 18n], [12n, -18n], [-12n, -18n], [1n, 1n], [100n, 75n], [17n, 51n], [-9n, 3n]];

            for (const [numerator, denominator] of pairs) {
                const fraction = new Fraction(numerator, denominator);

                expect(Integer.gcd(fraction.numerator, fraction.denominator)).toBe(1n);
                expect(fraction.denominator > 0n).toBe(true);
                expect(fraction.toNumber()).toBeCloseTo(Number(numerator) / Number(denominator), 12);
            }
        });
    });

    describe("predicates", () => {
        it("detects negatives", () => {
            const fraction = new Fraction(-25n, 49n);

            expect(fraction.isNeg()).toBe(true);
            expect(fraction.abs().toString()).toBe("(25/49)");
            expect(fraction.abs().isNeg()).toBe(false);
        });

        it("detects perfect squares of the absolute value", () => {
            expect(new Fraction(49n, 25n).isAbsSquare()).toBe(true);
            expect(new Fraction(-25n, 49n).isAbsSquare()).toBe(true);
            expect(new Fraction(1n, 0n).isAbsSquare()).toBe(true);
            expect(new Fraction(7n).isAbsSquare()).toBe(false);
        });

        it("detects perfect cubes", () => {
            expect(new Fraction(8n, 27n).isCube()).toBe(true);
            expect(new Fraction(-8n, 27n).isCube()).toBe(true);
            expect(Fraction.zero.isCube()).toBe(true);
            expect(new Fraction(56n, 45n).isCube()).toBe(false);
        });
    });

    describe("conversion", () => {
        it("divides as floats", () => {
            expect(new Fraction(1n, 4n).toNumber()).toBe(0.25);
            expect(Fraction.infinity.toNumber()).toBe(Infinity);
            expect(new Fraction(-1n, 0n).toNumber()).toBe(-Infinity);
        });
    });

    describe("constants", () => {
        it("exposes zero, one and infinity", () => {
            expect(Fraction.zero.toString()).toBe("0");
            expect(Fraction.one.toString()).toBe("1");
            expect(Fraction.infinity.toString()).toBe("(1/0)");
        });

        it("caches constants per config", () => {
            const config = new FractionConfig({ bits: 16 });
            const constants = Fraction.constantsOf(config);

            expect(Fraction.constantsOf(config)).toBe(constants);
            expect(constants.infinity.config).toBe(config);
            expect(Fraction.constantsOf(FractionConfig.default).one).toBe(Fraction.one);
        });
    });

    describe("mediant and average", () => {
        const threeHalves = new Fraction(3n, 2n);

        it("adds numerators and denominators", () => {
            expect(Fraction.mediant(new Fraction(48n, 7n), threeHalves).toString()).toBe("(17/3)");
            expect(Fraction.mediant(new Fraction(-25n, 49n), threeHalves).toString()).toBe("(-22/51)");
            expect(Fraction.mediant(Fraction.zero, threeHalves).toString()).toBe("1");
            expect(Fraction.mediant(Fraction.infinity, threeHalves).toString()).toBe("2");
        });

        it("averages any number of fractions", () => {
            const half = new Fraction(1n, 2n);
            const quarter = new Fraction(1n, 4n);

            expect(Fraction.average(half, quarter, new Fraction(7n)).toString()).toBe("(31/12)");
            expect(Fraction.average(half, quarter, new Fraction(48n, 7n)).toString()).toBe("(71/28)");
            expect(Fraction.average(half, quarter, Fraction.infinity).toString()).toBe("(1/0)");
            expect(Fraction.average()).toBe(Fraction.zero);
        });
    });

    describe("square and cube", () => {
        it("multiplies exactly", () => {
            expect(new Fraction(48n, 7n).square().toString()).toBe("(2304/49)");
            expect(new Fraction(48n, 7n).cube().toString()).toBe("(110592/343)");
            expect(new Fraction(-25n, 49n).cube().toString()).toBe("(-15625/117649)");
        });
    });
});
