import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        include: ['engine/test/**/*.test.ts', 'bench/test/**/*.test.ts'],
    },
    resolve: {
        alias: {
            '@opener-lab/engine': fileURLToPath(new URL('./engine/src/index.ts', import.meta.url)),
            '@opener-lab/bench': fileURLToPath(new URL('./bench/src/index.ts', import.meta.url)),
        },
    },
});
