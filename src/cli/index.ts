import { runHeadlessSimulation, type SimulationInput } from './simulate';

export interface CliCommand {
    readonly execute: () => Promise<number>;
}

export const USAGE = 'Usage: grid-chase <simulate> [--seed N] [--duration S] [--fps F] [--levels DIR] [--telemetry]';

interface ParsedSimulateOptions {
    seed?: number;
    durationSec?: number;
    fps?: number;
    levelsDir?: string;
    telemetry?: boolean;
}

export class CliUsageError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'CliUsageError';
    }
}

const parseNumber = (flag: string, raw: string | undefined): number => {
    const value = raw === undefined ? Number.NaN : Number(raw);
    if (!Number.isFinite(value)) {
        throw new CliUsageError(`${flag} expects a number, received ${raw ?? 'nothing'}`);
    }
    return value;
};

const parseSimulateArgs = (args: readonly string[]): ParsedSimulateOptions => {
    const options: ParsedSimulateOptions = {};
    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        if (arg === '--seed') {
            options.seed = Math.trunc(parseNumber(arg, args[i + 1]));
            i++;
        } else if (arg === '--duration') {
            options.durationSec = parseNumber(arg, args[i + 1]);
            i++;
        } else if (arg === '--fps') {
            options.fps = parseNumber(arg, args[i + 1]);
            i++;
        } else if (arg === '--levels') {
            const directory = args[i + 1];
            if (!directory) {
                throw new CliUsageError('--levels expects a directory');
            }
            options.levelsDir = directory;
            i++;
        } else if (arg === '--telemetry') {
            options.telemetry = true;
        } else {
            throw new CliUsageError(`Unknown option ${arg}`);
        }
    }
    return options;
};

const describeError = (error: unknown): string => (error instanceof Error ? error.message : String(error));

export function createCli(argv: readonly string[] = process.argv.slice(2)): CliCommand {
    const execute = async (): Promise<number> => {
        const [command, ...restArgs] = argv;

        if (command !== 'simulate') {
            console.error(USAGE);
            return 1;
        }

        let parsed: ParsedSimulateOptions;
        try {
            parsed = parseSimulateArgs(restArgs);
        } catch (error) {
            console.error(describeError(error));
            console.error(USAGE);
            return 1;
        }

        const { telemetry, ...rest } = parsed;
        const input = {
            mode: 'simulate' as const,
            ...rest,
            ...(telemetry ? { options: { telemetry: true } } : {}),
        } satisfies SimulationInput;

        try {
            const result = await runHeadlessSimulation(input);
            console.log(JSON.stringify(result));
            return 0;
        } catch (error) {
            console.error(`Simulation failed: ${describeError(error)}`);
            return 1;
        }
    };

    return {
        execute,
    };
}
