import { Fraction, type Operand } from "./Fraction";

// Free forms of the Fraction operators, for when the left-hand side may be a bare bigint or number.

export function add(lhs: Operand, rhs: Operand): Fraction {
    if (lhs instanceof Fraction) return lhs.add(rhs);
    if (rhs instanceof Fraction) return rhs.add(lhs);

    return Fraction.from(lhs).add(rhs);
}

export function sub(lhs: Operand, rhs: Operand): Fraction {
    if (lhs instanceof Fraction) return lhs.sub(rhs);
    if (rhs instanceof Fraction) return rhs.negate().add(lhs);

    return Fraction.from(lhs).sub(rhs);
}

export function mul(lhs: Operand, rhs: Operand): Fraction {
    if (lhs instanceof Fraction) return lhs.mul(rhs);
    if (rhs instanceof Fraction) return rhs.mul(lhs);

    return Fraction.from(lhs).mul(rhs);
}

export function div(lhs: Operand, rhs: Operand): Fraction {
    if (lhs instanceof Fraction) return lhs.div(rhs);
    if (!(rhs instanceof Fraction)) return Fraction.from(lhs).div(rhs);

    const { numerator, denominator, config } = rhs;
    if (typeof lhs === "bigint") return new Fraction(lhs * denominator, numerator, config);

    return numerator === 0n ? rhs.inverse() : Fraction.fromNumber(lhs * rhs.inverse().toNumber(), config);
}

export function mod(lhs: Operand, rhs: Operand): Fraction {
    if (lhs instanceof Fraction) return lhs.mod(rhs);
    if (!(rhs instanceof Fraction)) return Fraction.from(lhs).mod(rhs);

    const { denominator, config } = rhs;
    if (typeof lhs === "bigint") return new Fraction(lhs, 1n, config).mod(rhs);

    return denominator === 0n ? rhs : Fraction.fromNumber(lhs % rhs.toNumber(), config);
}
