//
//
//

import * as dotenv from 'dotenv';

import { loadConfig } from './config';
import { Animator } from './domain';
import { ConsoleDisplay, PatternLibrary } from './infrastructure';
import { createEngine, describePatterns } from './setup';
import { getLogger, setLogLevel } from './utils';

async function main() {
    dotenv.config();
    const config = loadConfig();
    setLogLevel(config.logLevel);

    const library = PatternLibrary.builtin();
    if (config.list) {
        // eslint-disable-next-line no-console
        describePatterns(library).forEach((line) => console.log(line));
        return;
    }

    const animator = new Animator(createEngine(config, library), new ConsoleDisplay());
    await animator.run(config.steps, config.delay);
}

main().catch((err: unknown) => {
    getLogger('main').error(err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
});
