import { consoleLogger } from './logger.js';
import { createProgram } from './program.js';

createProgram(consoleLogger)
    .parseAsync(process.argv)
    .catch((err: unknown) => {
        consoleLogger.error(err instanceof Error ? err.message : String(err));
        process.exitCode = 1;
    });
