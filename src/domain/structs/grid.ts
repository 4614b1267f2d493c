//
//
//

/**
 * GridSize is a model that represents the size of a grid.
 */
export class GridSize {
    public constructor(
        public readonly rows: number,
        public readonly columns: number,
    ) {}

    public get area(): number {
        return this.rows * this.columns;
    }

    public equals(other: GridSize): boolean {
        return this.rows === other.rows && this.columns === other.columns;
    }

    public toString(): string {
        return `${this.rows}x${this.columns}`;
    }
}
