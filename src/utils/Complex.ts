export interface Complex {
    re: number;
    im: number;
}

export function polar(magnitude: number, angle: number): Complex {
    return { re: magnitude * Math.cos(angle), im: magnitude * Math.sin(angle) };
}

// Principal square root of a real number taken as a complex one.
export function sqrt(float: number): Complex {
    if (float >= 0 || Number.isNaN(float)) return { re: Math.sqrt(float), im: 0 };
    return { re: 0, im: Math.sqrt(-float) };
}

export function pow(float: number, exponent: number): Complex {
    switch (true) {
        case float > 0:
        case Number.isNaN(float): return { re: Math.pow(float, exponent), im: 0 };

        case float === 0: return { re: exponent === 0 ? 1 : Math.pow(0, exponent), im: 0 };

        default: return polar(Math.pow(-float, exponent), exponent * Math.PI);
    }
}
