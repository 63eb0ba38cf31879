import type { GameConfig, ScreenRect } from 'config/game';
import type { Direction } from 'game/types';
import type { Logger } from 'util/log';
import type { GamePhase, GridChaseEventBus } from './events';
import type { LifecycleOrchestrator } from './lifecycle';
import { transitionPhase, type GameSession } from './session';

export type PointerAction = 'down' | 'up';

export type InputEvent =
    | { readonly type: 'confirm' }
    | { readonly type: 'cancel' }
    | { readonly type: 'quit' }
    | { readonly type: 'direction'; readonly direction: Direction }
    | { readonly type: 'pointer'; readonly action: PointerAction; readonly x: number; readonly y: number }
    /** Coordinates normalised to 0..1 of the screen */
    | { readonly type: 'touch'; readonly x: number; readonly y: number };

export type InputResult = 'continue' | 'quit';

export interface GameStateMachine {
    readonly phase: GamePhase;
    handleInput(event: InputEvent): InputResult;
}

export interface GameStateMachineOptions {
    readonly session: GameSession;
    readonly lifecycle: LifecycleOrchestrator;
    readonly bus: GridChaseEventBus;
    readonly config: GameConfig;
    readonly logger: Logger;
}

export const isInsideRect = (rect: ScreenRect, x: number, y: number): boolean =>
    x >= rect.x && x < rect.x + rect.width && y >= rect.y && y < rect.y + rect.height;

export const createGameStateMachine = ({
    session,
    lifecycle,
    bus,
    config,
    logger,
}: GameStateMachineOptions): GameStateMachine => {
    const { screen } = config;

    const hitsStartControl = (event: InputEvent): boolean => {
        switch (event.type) {
            case 'confirm':
                return true;
            case 'pointer':
                return isInsideRect(screen.startControl, event.x, event.y);
            case 'touch':
                return isInsideRect(screen.startControl, event.x * screen.width, event.y * screen.height);
            default:
                return false;
        }
    };

    const startPlay = () => {
        session.engine.player.active = true;
        session.timeBudgetMs = 0;
        transitionPhase(session, bus, 'play');
        logger.info('Play started', { level: session.level });
    };

    const handleTitle = (event: InputEvent) => {
        if (hitsStartControl(event)) {
            startPlay();
        }
    };

    const handleGameOver = (event: InputEvent) => {
        if (event.type === 'confirm' || event.type === 'pointer' || event.type === 'touch') {
            lifecycle.resetSession();
        }
    };

    const handlePlay = (event: InputEvent) => {
        if (event.type === 'direction') {
            session.engine.player.nextDirection = event.direction;
        }
    };

    const handleInput: GameStateMachine['handleInput'] = (event) => {
        if (event.type === 'cancel' || event.type === 'quit') {
            logger.info('Quit requested', { phase: session.phase, source: event.type });
            return 'quit';
        }

        switch (session.phase) {
            case 'title':
                handleTitle(event);
                break;
            case 'play':
                handlePlay(event);
                break;
            case 'game-over':
                handleGameOver(event);
                break;
        }

        return 'continue';
    };

    return {
        get phase() {
            return session.phase;
        },
        handleInput,
    };
};
