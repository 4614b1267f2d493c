//
//
//

import { LifeConfig } from './config';
import { LifeEngine } from './domain';
import { PatternLibrary } from './infrastructure';
import { MathRandomSource, SeededRandomSource } from './utils';

/**
 * One line per pattern: name, bounding size and description in columns.
 */
export function describePatterns(library: PatternLibrary): string[] {
    return library
        .list()
        .map((pattern) => `${pattern.name.padEnd(20)} ${pattern.size.toString().padEnd(8)} ${pattern.description}`);
}

/**
 * Builds the engine described by the configuration and seeds it, either with
 * the named pattern centred on the grid or with a random fill.
 *
 * @throws UnknownPatternError if the configured pattern is not in the library.
 */
export function createEngine(config: LifeConfig, library: PatternLibrary): LifeEngine {
    const random = config.seed === null ? new MathRandomSource() : new SeededRandomSource(config.seed);
    const engine = new LifeEngine(config.rows, config.columns, random);

    if (config.pattern === null) {
        engine.randomize(config.density);
    } else {
        engine.populate(library.get(config.pattern).centeredIn(engine.size).cells);
    }

    return engine;
}
