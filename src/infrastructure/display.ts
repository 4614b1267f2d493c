//
//
//

import { Display } from '../domain';

const CLEAR_SCREEN = '\x1b[2J\x1b[H';

export interface OutputStream {
    readonly isTTY?: boolean;
    write(chunk: string): boolean;
}

/**
 * Writes frames to a stream, redrawing in place on terminals.
 */
export class ConsoleDisplay implements Display {
    private readonly _stream: OutputStream;

    public constructor(stream: OutputStream = process.stdout) {
        this._stream = stream;
    }

    public write(frame: string): void {
        if (this._stream.isTTY) {
            this._stream.write(CLEAR_SCREEN);
        }
        this._stream.write(`${frame}\n`);
    }
}
