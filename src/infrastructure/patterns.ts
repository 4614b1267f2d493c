//
//
//

import { GridSize, Position, UnknownPatternError } from '../domain';
import catalog from './patterns.json';

/**
 * A named set of alive cells, ready to be passed to LifeEngine.populate.
 */
export class Pattern {
    public readonly cells: readonly Position[];

    public constructor(
        public readonly name: string,
        public readonly description: string,
        cells: Iterable<Position>,
    ) {
        this.cells = Object.freeze([...cells]);
    }

    /**
     * Smallest size that contains every cell, measured from the top-left
     * alive cell.
     */
    public get size(): GridSize {
        if (this.cells.length === 0) {
            return new GridSize(0, 0);
        }

        const { top, left, bottom, right } = this.bounds();
        return new GridSize(bottom - top + 1, right - left + 1);
    }

    public translate(rowOffset: number, columnOffset: number): Pattern {
        return new Pattern(
            this.name,
            this.description,
            this.cells.map((cell) => cell.translate(rowOffset, columnOffset)),
        );
    }

    /**
     * Moves the pattern so that its bounding box sits in the middle of a grid
     * of the given size. Patterns larger than the grid overflow on every side.
     */
    public centeredIn(size: GridSize): Pattern {
        if (this.cells.length === 0) {
            return this;
        }

        const { top, left } = this.bounds();
        const own = this.size;
        const rowOffset = Math.floor((size.rows - own.rows) / 2) - top;
        const columnOffset = Math.floor((size.columns - own.columns) / 2) - left;
        return this.translate(rowOffset, columnOffset);
    }

    private bounds(): { top: number; left: number; bottom: number; right: number } {
        const rows = this.cells.map((cell) => cell.row);
        const columns = this.cells.map((cell) => cell.column);
        return {
            top: Math.min(...rows),
            left: Math.min(...columns),
            bottom: Math.max(...rows),
            right: Math.max(...columns),
        };
    }
}

export interface PatternDefinition {
    readonly name: string;
    readonly description: string;
    readonly cells: ReadonlyArray<ReadonlyArray<number>>;
}

export class PatternLibrary {
    private readonly _patterns = new Map<string, Pattern>();

    public constructor(definitions: Iterable<PatternDefinition>) {
        for (const definition of definitions) {
            const cells = definition.cells.map(([row, column]) => new Position(row, column));
            this._patterns.set(
                definition.name,
                new Pattern(definition.name, definition.description, cells),
            );
        }
    }

    /**
     * Library holding the bundled catalogue.
     */
    public static builtin(): PatternLibrary {
        return new PatternLibrary(catalog);
    }

    public names(): string[] {
        return [...this._patterns.keys()];
    }

    public has(name: string): boolean {
        return this._patterns.has(name);
    }

    /**
     * @throws UnknownPatternError if no pattern has the given name.
     */
    public get(name: string): Pattern {
        const pattern = this._patterns.get(name);
        if (pattern === undefined) {
            throw new UnknownPatternError(name);
        }

        return pattern;
    }

    public list(): Pattern[] {
        return [...this._patterns.values()];
    }
}
