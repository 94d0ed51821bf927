import { readFileSync } from 'node:fs';

/** Representative word list shared by the solver tests, in file order */
export function loadFixtureWords(): string[] {
    return readFileSync(new URL('./fixtures/words.txt', import.meta.url), 'utf8')
        .split('\n')
        .map((line) => line.trim())
        .filter((line) => line.length > 0 && !line.startsWith('#'));
}
