//
//
//

import { GridSnapshot } from '../structs';

export interface TextRendererOptions {
    readonly alive: string;
    readonly dead: string;
}

const DEFAULT_OPTIONS: TextRendererOptions = { alive: '#', dead: '.' };

/**
 * Turns a snapshot into a "Generation N" title followed by one line per row.
 */
export class TextRenderer {
    private readonly _options: TextRendererOptions;

    public constructor(options: Partial<TextRendererOptions> = {}) {
        this._options = { ...DEFAULT_OPTIONS, ...options };
    }

    public render(snapshot: GridSnapshot): string {
        const { alive, dead } = this._options;
        const lines = snapshot.cells.map((row) => row.map((cell) => (cell ? alive : dead)).join(''));
        return [`Generation ${snapshot.generation}`, ...lines].join('\n');
    }
}
