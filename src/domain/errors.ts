//
//
//

/**
 * Thrown when a grid is requested with a non-positive or non-integer size.
 */
export class InvalidDimensionError extends Error {
    public constructor(rows: number, columns: number) {
        super(`Invalid grid dimensions: ${rows}x${columns}. Rows and columns must be positive integers.`);
        this.name = "InvalidDimensionError";
    }
}

/**
 * Thrown when an operation argument is outside its accepted range.
 */
export class InvalidParameterError extends Error {
    public constructor(
        public readonly parameter: string,
        value: unknown,
        expected: string,
    ) {
        super(`Invalid ${parameter}: ${String(value)}. Expected ${expected}.`);
        this.name = "InvalidParameterError";
    }
}

export class UnknownPatternError extends Error {
    public constructor(name: string) {
        super(`Unknown pattern: ${name}.`);
        this.name = "UnknownPatternError";
    }
}

export class MissingOptionError extends Error {
    public constructor(option: string) {
        super(`Missing option ${option}.`);
        this.name = "MissingOptionError";
    }
}
