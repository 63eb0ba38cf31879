import { resolveGameConfig, type GameConfig } from 'config/game';
import { createGridLevelEngineFactory } from 'game/level-engine';
import type { LevelCatalogue } from 'game/levels';
import type { LevelEngineFactory } from 'game/types';
import { rootLogger, type Logger } from 'util/log';
import { createSeededRandom, type SeededRandom } from 'util/random';
import { createEventBus, type GridChaseEventBus } from './events';
import { createLifecycleOrchestrator, type LifecycleOrchestrator } from './lifecycle';
import type { FrameLoopRuntime } from './loop';
import { createGameSession, snapshotSession, type GameSession } from './session';
import { createGameStateMachine, type GameStateMachine } from './state-machine';
import { createSimulationStepper, type SimulationStepper } from './stepper';

export interface GameRuntimeOptions {
    readonly catalogue: LevelCatalogue;
    /** Defaults to the grid engine over `catalogue` */
    readonly engineFactory?: LevelEngineFactory;
    /** Invalid values fall back to the defaults with a warning */
    readonly config?: GameConfig;
    readonly random?: SeededRandom;
    readonly sessionId?: string;
    readonly bus?: GridChaseEventBus;
    readonly now?: () => number;
    readonly logger?: Logger;
}

export interface GameRuntime extends FrameLoopRuntime {
    readonly events: GridChaseEventBus;
    readonly session: Readonly<GameSession>;
    readonly machine: GameStateMachine;
    readonly stepper: SimulationStepper;
    readonly lifecycle: LifecycleOrchestrator;
    readonly config: GameConfig;
}

export const createGameRuntime = ({
    catalogue,
    engineFactory,
    config: requestedConfig,
    random = createSeededRandom(),
    sessionId,
    bus,
    now,
    logger = rootLogger.child('runtime'),
}: GameRuntimeOptions): GameRuntime => {
    const config = resolveGameConfig(requestedConfig);
    const events = bus ?? createEventBus({ now });
    const factory = engineFactory ?? createGridLevelEngineFactory({ catalogue, config, random });

    const session = createGameSession({
        config,
        engineFactory: factory,
        sessionId,
        random: random.next,
    });

    const lifecycle = createLifecycleOrchestrator({
        session,
        engineFactory: factory,
        catalogue,
        bus: events,
        config,
        logger: logger.child('lifecycle'),
    });

    const stepper = createSimulationStepper({
        session,
        lifecycle,
        bus: events,
        config,
        logger: logger.child('stepper'),
    });

    const machine = createGameStateMachine({
        session,
        lifecycle,
        bus: events,
        config,
        logger: logger.child('input'),
    });

    logger.info('Runtime created', { sessionId: session.sessionId, levels: catalogue.size });

    return {
        events,
        session,
        machine,
        stepper,
        lifecycle,
        config,
        handleInput: machine.handleInput,
        advance: stepper.advance,
        snapshot: () => snapshotSession(session),
    } satisfies GameRuntime;
};
