import { describe, expect, it } from 'vitest';
import { gameConfig } from 'config/game';
import { createEventBus } from 'app/events';
import { createGameSession, replaceEngine, snapshotSession, transitionPhase } from 'app/session';
import { createFakeEngine } from './fakes';

const factory = (levelIndex: number) =>
    createFakeEngine({
        levelIndex,
        width: 3,
        height: 2,
        player: { x: 4, y: 0 },
        pellets: [{ x: 2, y: 1 }],
        pursuers: [{ position: { x: 8, y: 4 }, caged: true }],
    });

describe('createGameSession', () => {
    it('starts on the title screen with the configured lives and first level', () => {
        const session = createGameSession({ config: gameConfig, engineFactory: factory, sessionId: 'test-session' });

        expect(session).toMatchObject({
            sessionId: 'test-session',
            score: 0,
            lives: 2,
            level: 1,
            phase: 'title',
            gameOver: false,
            timeBudgetMs: 0,
        });
        expect(session.engine.levelIndex).toBe(1);
    });

    it('derives a session id from the random source when none is given', () => {
        const session = createGameSession({ config: gameConfig, engineFactory: factory, random: () => 0.5 });

        expect(session.sessionId).toBe('session-7fffffff');
    });
});

describe('replaceEngine', () => {
    it('installs a fresh, active level and clears the time budget', () => {
        const session = createGameSession({ config: gameConfig, engineFactory: factory, sessionId: 'test-session' });
        session.timeBudgetMs = 90;

        replaceEngine(session, factory, 3);

        expect(session.level).toBe(3);
        expect(session.engine.levelIndex).toBe(3);
        expect(session.engine.player.active).toBe(true);
        expect(session.timeBudgetMs).toBe(0);
    });
});

describe('transitionPhase', () => {
    it('publishes only real changes', () => {
        const bus = createEventBus({ now: () => 0 });
        const seen: unknown[] = [];
        bus.subscribe('PhaseChanged', (event) => {
            seen.push(event.payload);
        });
        const session = createGameSession({ config: gameConfig, engineFactory: factory, sessionId: 'test-session' });

        transitionPhase(session, bus, 'title');
        transitionPhase(session, bus, 'play');

        expect(session.phase).toBe('play');
        expect(seen).toEqual([{ sessionId: 'test-session', from: 'title', to: 'play' }]);
    });
});

describe('snapshotSession', () => {
    it('copies the presentation view of the session', () => {
        const session = createGameSession({ config: gameConfig, engineFactory: factory, sessionId: 'test-session' });
        session.score = 30;

        const snapshot = snapshotSession(session);

        expect(snapshot).toEqual({
            sessionId: 'test-session',
            phase: 'title',
            score: 30,
            lives: 2,
            level: 1,
            gameOver: false,
            pelletsRemaining: 1,
            player: { id: 'player', position: { x: 4, y: 0 }, direction: 'left', nextDirection: null, active: false },
            pursuers: [{ id: 'pursuer-1', position: { x: 8, y: 4 }, direction: 'up', active: true, caged: true }],
            tiles: [
                ['empty', 'empty'],
                ['empty', 'empty'],
                ['empty', 'pellet'],
            ],
        });
    });

    it('does not share positions with the live engine', () => {
        const session = createGameSession({ config: gameConfig, engineFactory: factory, sessionId: 'test-session' });
        const snapshot = snapshotSession(session);

        session.engine.player.position = { x: 5, y: 0 };

        expect(snapshot.player.position).toEqual({ x: 4, y: 0 });
    });
});
