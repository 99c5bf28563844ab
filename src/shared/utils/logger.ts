export interface Logger {
    log(message: string): void;
    success(message: string): void;
    warn(message: string): void;
    error(message: string): void;
}

export const consoleLogger: Logger = {
    log: message => console.log(message),
    success: message => console.log(`✓ ${message}`),
    warn: message => console.warn(`⚠ ${message}`),
    error: message => console.error(`✗ ${message}`),
};

export const silentLogger: Logger = {
    log: () => undefined,
    success: () => undefined,
    warn: () => undefined,
    error: () => undefined,
};

// Warnings are collected on the run report as well as echoed.
export function logWarning(message: string, warnings: string[], logger: Logger = consoleLogger): void {
    warnings.push(message);
    logger.warn(message);
}
