//
//
//

import { Logger } from 'winston';

import { Duration, getLogger, sleep } from '../../utils';
import { InvalidParameterError } from '../errors';
import { Display } from '../ports';
import { LifeEngine } from './engine';
import { TextRenderer } from './renderer';

/**
 * Drives an engine and shows each generation on a display.
 *
 * The animator only reads the engine through snapshot(), so the engine knows
 * nothing about how it is being shown.
 */
export class Animator {
    private readonly _logger: Logger;

    public constructor(
        private readonly _engine: LifeEngine,
        private readonly _display: Display,
        private readonly _renderer: TextRenderer = new TextRenderer(),
    ) {
        this._logger = getLogger('animator');
    }

    /**
     * Shows the current generation, then advances and shows again until
     * `frames` frames have been shown.
     *
     * @throws InvalidParameterError if frames is not a non-negative integer.
     */
    public async run(frames: number, delay: Duration): Promise<void> {
        if (!Number.isInteger(frames) || frames < 0) {
            throw new InvalidParameterError('frames', frames, 'a non-negative integer');
        }

        for (let frame = 0; frame < frames; frame += 1) {
            this.show();

            if (frame < frames - 1) {
                // eslint-disable-next-line no-await-in-loop
                await sleep(delay);
                this._engine.step();
            }
        }

        this._logger.info(
            `finished at generation ${this._engine.generation} with ${this._engine.aliveCount()} alive cells`,
        );
    }

    public show(): void {
        this._display.write(this._renderer.render(this._engine.snapshot()));
    }
}
