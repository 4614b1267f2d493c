//
//
//

import { GridSize } from './grid';
import { Position } from './location';

/**
 * Immutable copy of the grid at a given generation.
 *
 * Holds no reference to the engine buffers, so renderers can keep it around
 * while the engine moves on.
 */
export class GridSnapshot {
    public readonly cells: ReadonlyArray<ReadonlyArray<boolean>>;

    private constructor(
        public readonly size: GridSize,
        public readonly generation: number,
        cells: boolean[][],
    ) {
        this.cells = Object.freeze(cells.map((row) => Object.freeze(row)));
        Object.freeze(this);
    }

    /**
     * Copies a row-major buffer where a non-zero byte means alive.
     */
    public static fromBuffer(size: GridSize, generation: number, buffer: Uint8Array): GridSnapshot {
        const cells: boolean[][] = [];
        for (let row = 0; row < size.rows; row += 1) {
            const line: boolean[] = new Array<boolean>(size.columns);
            for (let column = 0; column < size.columns; column += 1) {
                line[column] = buffer[row * size.columns + column] !== 0;
            }
            cells.push(line);
        }

        return new GridSnapshot(size, generation, cells);
    }

    public get rows(): number {
        return this.size.rows;
    }

    public get columns(): number {
        return this.size.columns;
    }

    public isAlive(position: Position): boolean {
        return position.isValid(this.size) && this.cells[position.row][position.column];
    }

    public aliveCount(): number {
        let count = 0;
        for (const row of this.cells) {
            for (const alive of row) {
                if (alive) {
                    count += 1;
                }
            }
        }
        return count;
    }

    /**
     * Alive positions in row-major order.
     */
    public alivePositions(): Position[] {
        const positions: Position[] = [];
        this.cells.forEach((row, r) => {
            row.forEach((alive, c) => {
                if (alive) {
                    positions.push(new Position(r, c));
                }
            });
        });
        return positions;
    }

    public equals(other: GridSnapshot): boolean {
        if (!this.size.equals(other.size) || this.generation !== other.generation) {
            return false;
        }

        return this.cells.every((row, r) => row.every((alive, c) => alive === other.cells[r][c]));
    }
}
