import {
    linearDistance,
    signedLinearDelta,
    signedWrapDelta,
    wrapDistance,
    type AbsolutePosition,
} from 'util/wrap';

export interface MotionSample {
    readonly previous: AbsolutePosition;
    readonly current: AbsolutePosition;
}

export interface PursuerSample extends MotionSample {
    readonly id: string;
    readonly active: boolean;
    readonly caged: boolean;
}

export type CollisionKind = 'overlap' | 'tunnel-horizontal' | 'tunnel-vertical';

export interface CollisionHit {
    readonly pursuerId: string;
    readonly kind: CollisionKind;
}

export interface CollisionOptions {
    /** Period of the wrapping horizontal axis, in sub-units */
    readonly xPeriod: number;
    /** Sub-unit tolerance for overlap and axis alignment */
    readonly threshold: number;
}

const crossedZero = (before: number, after: number): boolean =>
    before === 0 || after === 0 || (before > 0) !== (after > 0);

const testPursuer = (
    player: MotionSample,
    pursuer: PursuerSample,
    { xPeriod, threshold }: CollisionOptions,
): CollisionKind | null => {
    const dxNow = wrapDistance(player.current.x, pursuer.current.x, xPeriod);
    const dyNow = linearDistance(player.current.y, pursuer.current.y);

    if (dxNow <= threshold && dyNow <= threshold) {
        return 'overlap';
    }

    const dxPrev = wrapDistance(player.previous.x, pursuer.previous.x, xPeriod);
    const dyPrev = linearDistance(player.previous.y, pursuer.previous.y);

    if (dyPrev <= threshold && dyNow <= threshold) {
        const before = signedWrapDelta(player.previous.x, pursuer.previous.x, xPeriod);
        const after = signedWrapDelta(player.current.x, pursuer.current.x, xPeriod);
        // On a ring the sign also flips at the antipode; only the short arc is a crossing.
        const shortArc = Math.abs(before) + Math.abs(after) < xPeriod / 2;
        if (shortArc && crossedZero(before, after)) {
            return 'tunnel-horizontal';
        }
    }

    if (dxPrev <= threshold && dxNow <= threshold) {
        const before = signedLinearDelta(player.previous.y, pursuer.previous.y);
        const after = signedLinearDelta(player.current.y, pursuer.current.y);
        if (crossedZero(before, after)) {
            return 'tunnel-vertical';
        }
    }

    return null;
};

/**
 * Finds the first pursuer that caught the player during the last tick, using
 * only the positions before and after it. Catches both plain overlap and two
 * agents that swapped sides between samples without ever overlapping.
 */
export const detectCatch = (
    player: MotionSample,
    pursuers: readonly PursuerSample[],
    options: CollisionOptions,
): CollisionHit | null => {
    for (const pursuer of pursuers) {
        if (!pursuer.active || pursuer.caged) {
            continue;
        }

        const kind = testPursuer(player, pursuer, options);
        if (kind) {
            return { pursuerId: pursuer.id, kind };
        }
    }

    return null;
};

export const checkCollision = (
    player: MotionSample,
    pursuers: readonly PursuerSample[],
    options: CollisionOptions,
): boolean => detectCatch(player, pursuers, options) !== null;
