export interface Logger {
    info(message: string): void;
    warn(message: string): void;
    error(message: string): void;
}

export const consoleLogger: Logger = {
    info: (message) => console.log(message),
    warn: (message) => console.warn(message),
    error: (message) => console.error(message),
};

/** Collects lines instead of printing them (tests) */
export interface MemoryLogger extends Logger {
    lines: string[];
}

export function createMemoryLogger(): MemoryLogger {
    const lines: string[] = [];
    return {
        lines,
        info: (message) => lines.push(message),
        warn: (message) => lines.push(`WARN ${message}`),
        error: (message) => lines.push(`ERROR ${message}`),
    };
}
