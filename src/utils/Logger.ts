import pino from "pino";

const DEFAULT_LEVEL: string = "warn";

function resolveLevel(level: string | undefined): string {
    if (level === undefined) return DEFAULT_LEVEL;
    return level === "silent" || Object.hasOwn(pino.levels.values, level) ? level : DEFAULT_LEVEL;
}

const level = resolveLevel(globalThis.process?.env.FRACTION_LOG_LEVEL);

export const logger = pino({
    name: "mediant-fraction",
    level
});

export function createLogger(component: string): pino.Logger {
    return logger.child({ component });
}
