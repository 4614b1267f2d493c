//
//
//

import commandLineArgs, { OptionDefinition } from 'command-line-args';
import winston from 'winston';

import { InvalidParameterError, MissingOptionError } from './domain';
import { Duration } from './utils';

type OptionValue = string | number | boolean;

type OptionKind = 'number' | 'string' | 'flag';

interface Option {
    readonly name: string;
    readonly kind: OptionKind;
}

const OPTIONS: readonly Option[] = [
    { name: 'rows', kind: 'number' },
    { name: 'cols', kind: 'number' },
    { name: 'density', kind: 'number' },
    { name: 'seed', kind: 'string' },
    { name: 'pattern', kind: 'string' },
    { name: 'steps', kind: 'number' },
    { name: 'delay', kind: 'number' },
    { name: 'log-level', kind: 'string' },
    { name: 'list', kind: 'flag' },
];

const DEFAULT_VALUES = new Map<string, OptionValue>([
    ['rows', 30],
    ['cols', 30],
    ['density', 0.2],
    ['steps', 50],
    ['delay', 100],
    ['log-level', 'info'],
    ['list', false],
]);

export interface LifeConfig {
    readonly rows: number;
    readonly columns: number;
    readonly density: number;
    readonly seed: string | null;
    readonly pattern: string | null;
    readonly steps: number;
    readonly delay: Duration;
    readonly logLevel: string;
    readonly list: boolean;
}

function toDefinition(option: Option): OptionDefinition {
    switch (option.kind) {
        case 'number':
            return { name: option.name, type: Number };
        case 'flag':
            return { name: option.name, type: Boolean };
        default:
            return { name: option.name, type: String };
    }
}

function parseEnv(kind: OptionKind, raw: string): OptionValue {
    switch (kind) {
        case 'number':
            return Number(raw);
        case 'flag':
            return raw === 'true' || raw === '1';
        default:
            return raw;
    }
}

class OptionValues {
    public constructor(private readonly _values: Map<string, unknown>) {}

    public number(name: string): number {
        const value = this.get(name);
        if (typeof value !== 'number' || !Number.isFinite(value)) {
            throw new InvalidParameterError(name, value, 'a number');
        }
        return value;
    }

    public string(name: string): string {
        const value = this.get(name);
        if (typeof value !== 'string') {
            throw new InvalidParameterError(name, value, 'a string');
        }
        return value;
    }

    public optionalString(name: string): string | null {
        return this._values.has(name) || DEFAULT_VALUES.has(name) ? this.string(name) : null;
    }

    public flag(name: string): boolean {
        return this.get(name) === true;
    }

    private get(name: string): unknown {
        const value = this._values.has(name) ? this._values.get(name) : DEFAULT_VALUES.get(name);
        // command-line-args yields null for a flag given without its value
        if (value === null || value === undefined) {
            throw new MissingOptionError(name);
        }
        return value;
    }
}

/**
 * Builds the configuration from command line arguments, then environment
 * variables (option name upper-cased, dashes as underscores), then defaults.
 */
export function loadConfig(
    argv: string[] = process.argv.slice(2),
    env: NodeJS.ProcessEnv = process.env,
): LifeConfig {
    const values = new Map<string, unknown>();

    // first check if the corresponding environment variables are set
    for (const option of OPTIONS) {
        const raw = env[option.name.toUpperCase().replace(/-/g, '_')];
        if (raw !== undefined && raw !== '') {
            values.set(option.name, parseEnv(option.kind, raw));
        }
    }

    // then parse the command line arguments
    const cliArgs = commandLineArgs(OPTIONS.map(toDefinition), { argv });
    for (const [name, value] of Object.entries(cliArgs)) {
        values.set(name, value);
    }

    const options = new OptionValues(values);

    const delay = options.number('delay');
    if (delay < 0) {
        throw new InvalidParameterError('delay', delay, 'a non-negative number of milliseconds');
    }

    const logLevel = options.string('log-level');
    if (!(logLevel in winston.config.npm.levels)) {
        throw new InvalidParameterError(
            'log-level',
            logLevel,
            `one of ${Object.keys(winston.config.npm.levels).join(', ')}`,
        );
    }

    return {
        rows: options.number('rows'),
        columns: options.number('cols'),
        density: options.number('density'),
        seed: options.optionalString('seed'),
        pattern: options.optionalString('pattern'),
        steps: options.number('steps'),
        delay: Duration.fromMilliseconds(delay),
        logLevel,
        list: options.flag('list'),
    };
}
