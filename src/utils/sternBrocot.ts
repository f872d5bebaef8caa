import type { FractionConfig } from "../FractionConfig";
import { createLogger } from "./Logger";

const log = createLogger("stern-brocot");

/**
 * Walks the Stern-Brocot tree between `floor(float)` and `ceil(float)` until a mediant lies within `config.error` of `float`.
 *
 * NaN approximates to `0/1` and infinities to `±1/0`. A search that runs past `config.maxIterations` returns its last mediant.
 */
export function sternBrocot(float: number, config: FractionConfig): [bigint, bigint] {
    if (Number.isNaN(float)) {
        log.debug({ float }, "Approximating NaN as zero");
        return [0n, 1n];
    }

    if (!Number.isFinite(float)) {
        log.debug({ float }, "Approximating infinity as the infinity sentinel");
        return [float > 0 ? 1n : -1n, 0n];
    }

    const { error, maxIterations } = config;

    let lowerNum: bigint = config.toInteger(Math.floor(float));
    let lowerDen: bigint = 1n;

    let higherNum: bigint = config.toInteger(Math.ceil(float));
    let higherDen: bigint = 1n;

    if (lowerNum === higherNum) return [lowerNum, 1n];

    let medNum: bigint = lowerNum;
    let medDen: bigint = lowerDen;

    for (let i: number = 0; i < maxIterations; i++) {
        [medNum, medDen] = config.canonicalize(lowerNum + higherNum, lowerDen + higherDen);
        const diff = Number(medNum) / Number(medDen) - float;

        switch (true) {
            case diff > error: {
                higherNum = medNum;
                higherDen = medDen;

                break;
            }

            case diff < -error: {
                lowerNum = medNum;
                lowerDen = medDen;

                break;
            }

            default: return [medNum, medDen];
        }
    }

    log.warn({ float, maxIterations, numerator: medNum.toString(), denominator: medDen.toString() }, "Stern-Brocot search stopped at its iteration cap");
    return [medNum, medDen];
}
