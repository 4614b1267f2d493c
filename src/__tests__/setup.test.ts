//
//
//

import { loadConfig } from '../config';
import { UnknownPatternError } from '../domain';
import { PatternLibrary } from '../infrastructure';
import { createEngine, describePatterns } from '../setup';

describe('createEngine', () => {
    const library = PatternLibrary.builtin();

    test('centres the configured pattern', () => {
        const engine = createEngine(loadConfig(['--rows', '9', '--cols', '9', '--pattern', 'glider'], {}), library);

        expect(engine.generation).toBe(0);
        expect(engine.snapshot().alivePositions().map((cell) => cell.hash())).toEqual([
            '3,5',
            '4,3',
            '4,5',
            '5,4',
            '5,5',
        ]);
    });

    test('fills the grid at random without a pattern', () => {
        const engine = createEngine(loadConfig(['--rows', '4', '--cols', '5', '--density', '1'], {}), library);

        expect(engine.size.toString()).toBe('4x5');
        expect(engine.aliveCount()).toBe(20);
    });

    test('a seed makes the random fill reproducible', () => {
        const config = loadConfig(['--seed', 'test-seed', '--density', '0.5'], {});

        expect(createEngine(config, library).snapshot().equals(createEngine(config, library).snapshot())).toBe(true);
    });

    test('rejects a pattern missing from the library', () => {
        expect(() => createEngine(loadConfig(['--pattern', 'spaceship'], {}), library)).toThrow(UnknownPatternError);
    });
});

describe('describePatterns', () => {
    test('lists name, size and description in columns', () => {
        const lines = describePatterns(PatternLibrary.builtin());

        expect(lines).toHaveLength(12);
        expect(lines[2]).toBe(`block${' '.repeat(16)}2x2${' '.repeat(6)}Still life`);
    });
});
