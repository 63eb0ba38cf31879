import { runHeadlessSimulation, type SimulationInput } from 'cli/simulate';
import { gameConfig } from 'config/game';
import { createLogger, stderrLogWriter } from 'util/log';

const SEEDS = [3, 17, 42];

const DURATION_SEC = 60;

const logger = createLogger('simulate:verify', { writer: stderrLogWriter, level: 'warn' });

const serialize = (value: unknown): string => JSON.stringify(value, null, 2);

const fail = (message: string, details?: { expected?: unknown; actual?: unknown }): never => {
    console.error(`[simulate:verify] ${message}`);
    if (details?.expected !== undefined) {
        console.error(`[simulate:verify] expected: ${serialize(details.expected)}`);
    }
    if (details?.actual !== undefined) {
        console.error(`[simulate:verify] actual: ${serialize(details.actual)}`);
    }
    process.exit(1);
};

const verifySeed = async (seed: number): Promise<void> => {
    const input: SimulationInput = {
        mode: 'simulate',
        seed,
        durationSec: DURATION_SEC,
        options: { telemetry: true },
        logger,
    };

    const first = await runHeadlessSimulation(input);
    const second = await runHeadlessSimulation(input);

    if (serialize(first) !== serialize(second)) {
        fail(`simulation produced different results across runs for seed ${seed}`, {
            expected: first,
            actual: second,
        });
    }

    if (first.score !== first.metrics.pelletsEaten * gameConfig.scoring.pelletReward) {
        fail(`score does not match pellets eaten for seed ${seed}`, { actual: first });
    }

    console.log(
        `[simulate:verify] Deterministic simulation confirmed for seed ${seed}. score=${first.score}, ticks=${first.ticks}, phase=${first.phase}.`,
    );
};

const main = async (): Promise<void> => {
    for (const seed of SEEDS) {
        await verifySeed(seed);
    }
};

main().catch((error: unknown) => {
    fail(`unexpected error: ${error instanceof Error ? error.message : String(error)}`);
});
