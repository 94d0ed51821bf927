import { describe, it, expect } from 'vitest';
import { DEFAULT_SELECTOR_CONFIG } from '@opener-lab/engine';
import { DEFAULT_WORDS_FILE, loadConfig, resolveSelectorConfig } from '../src/config.js';
import { ConfigError } from '../src/errors.js';

describe('loadConfig', () => {
    it('fills in defaults', () => {
        const config = loadConfig({}, {});
        expect(config).toEqual({
            wordsFile: DEFAULT_WORDS_FILE,
            targets: 100,
            seed: 12345,
            saveInterval: 10,
            outDir: 'results',
            shardSize: 25,
            selector: {},
        });
    });

    it('reads environment variables', () => {
        const config = loadConfig({}, {
            OPENER_WORDS: 'words.txt',
            OPENER_TARGETS: '20',
            OPENER_SEED: '7',
            OPENER_OUT_DIR: 'out',
        });
        expect(config.wordsFile).toBe('words.txt');
        expect(config.targets).toBe(20);
        expect(config.seed).toBe(7);
        expect(config.outDir).toBe('out');
    });

    it('lets overrides win over the environment, except undefined ones', () => {
        const config = loadConfig({ targets: undefined, seed: 9 }, { OPENER_TARGETS: '20', OPENER_SEED: '7' });
        expect(config.targets).toBe(20);
        expect(config.seed).toBe(9);
    });

    it('hashes a text seed into a number', () => {
        expect(loadConfig({ seed: 'weekly' }, {}).seed).toBe(2011501196);
        expect(loadConfig({}, { OPENER_SEED: 'weekly' }).seed).toBe(2011501196);
        expect(loadConfig({ seed: '42' }, {}).seed).toBe(42);
    });

    it('upper-cases starters', () => {
        expect(loadConfig({ starters: ['slate', 'Crane'] }, {}).starters).toEqual(['SLATE', 'CRANE']);
    });

    it('rejects invalid values', () => {
        expect(() => loadConfig({ targets: 0 }, {})).toThrow(ConfigError);
        expect(() => loadConfig({ targets: 0 }, {})).toThrow(/^targets: /);
        expect(() => loadConfig({ starters: ['CRAN'] }, {})).toThrow('starters.0: starter must be 5 letters A-Z');
    });

    it('rejects unparseable environment values', () => {
        expect(() => loadConfig({}, { OPENER_TARGETS: 'many' })).toThrow(/^OPENER_TARGETS: /);
    });
});

describe('resolveSelectorConfig', () => {
    it('applies overrides on top of the default thresholds', () => {
        const selector = resolveSelectorConfig(loadConfig({ selector: { lateTurn: 4 } }, {}));
        expect(selector).toEqual({ ...DEFAULT_SELECTOR_CONFIG, lateTurn: 4 });
    });
});
