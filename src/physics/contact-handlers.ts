/**
 * Collision responses. Each handler reads the ball as it is when called, proposes the new
 * velocity through the speed governor and reports what happened through the event sink.
 */

import { Vector } from './matter';
import { pushOutOfWall, reflectFromWall, type DeathZoneTrigger } from './boundaries';
import type { BrickDestructionCoordinator } from './brick-coordinator';
import { brickBox, paddleBox, type BoundaryWall, type CollisionEvent, type PaddleSpec } from './contracts';
import type { CollisionHandler } from './collision-router';
import { separateCircleFromBox } from 'util/geometry';
import { governVelocity, type SpeedLimits } from 'util/speed-regulation';
import { reflectOffPaddle, type BounceAngleRange } from 'util/paddle-reflection';
import type { EventSink } from 'app/events';
import type { Vector2 } from 'types/input';

/**
 * The one mutable ball record; owned by the simulation and lent to handlers for the tick.
 */
export interface BallBody {
    position: Vector2;
    velocity: Vector2;
    readonly radius: number;
    collisionCount: number;
}

export interface ContactEnvironment {
    readonly ball: BallBody;
    readonly limits: SpeedLimits;
    readonly emit: EventSink;
}

export const createWallHandler = (
    env: ContactEnvironment,
    findWall: (id: string) => BoundaryWall | undefined,
): CollisionHandler => (event) => {
    const wall = findWall(event.colliderId);
    if (!wall) {
        return;
    }

    const { ball } = env;
    if (Vector.dot(ball.velocity, wall.normal) >= 0) {
        return;
    }

    ball.velocity = governVelocity(reflectFromWall(ball.velocity, wall.normal), env.limits);
    ball.position = pushOutOfWall(ball.position, ball.radius, wall);
    ball.collisionCount += 1;

    env.emit('WallBounce', {
        wallType: wall.type,
        contactPoint: event.contactPoint,
        speed: Vector.magnitude(ball.velocity),
    });
};

export const createPaddleHandler = (
    env: ContactEnvironment,
    paddle: () => PaddleSpec,
    angles: BounceAngleRange,
): CollisionHandler => (event: CollisionEvent) => {
    const { ball } = env;
    // Only a ball coming down onto the paddle bounces; one already leaving is left alone.
    if (ball.velocity.y >= 0) {
        return;
    }

    const current = paddle();
    const speed = Vector.magnitude(governVelocity(ball.velocity, env.limits));
    const reflection = reflectOffPaddle(event.contactPoint.x, current, speed, angles);

    ball.velocity = governVelocity(reflection.velocity, env.limits);
    ball.position = separateCircleFromBox(ball.position, ball.radius, paddleBox(current));
    ball.collisionCount += 1;

    env.emit('PaddleBounce', {
        contactPoint: event.contactPoint,
        resultingAngle: reflection.angle,
        speed: Vector.magnitude(ball.velocity),
    });
};

export const createBrickHandler = (
    env: ContactEnvironment,
    coordinator: () => BrickDestructionCoordinator,
    onCleared: () => void,
): CollisionHandler => (event) => {
    const bricks = coordinator();
    const brick = bricks.getBrick(event.colliderId);
    if (!brick || brick.destroyed) {
        return;
    }

    const { ball } = env;
    if (Vector.dot(ball.velocity, event.normal) < 0) {
        ball.velocity = governVelocity(reflectFromWall(ball.velocity, event.normal), env.limits);
    }
    ball.position = separateCircleFromBox(ball.position, ball.radius, brickBox(brick));
    ball.collisionCount += 1;

    const outcome = bricks.registerHit(brick.id);
    if (outcome.kind === 'ignored') {
        return;
    }

    if (outcome.kind === 'hit') {
        env.emit('BrickHit', { brickId: brick.id, remainingHitPoints: outcome.remainingHitPoints });
        return;
    }

    env.emit('BrickHit', { brickId: brick.id, remainingHitPoints: 0 });
    env.emit('BrickDestroyed', {
        brickId: brick.id,
        brickType: outcome.brick.type,
        position: outcome.brick.position,
    });

    if (bricks.isCleared()) {
        onCleared();
    }
};

export const createDeathZoneHandler = (
    env: ContactEnvironment,
    trigger: DeathZoneTrigger,
    onBallLost: () => void,
): CollisionHandler => () => {
    if (!trigger.registerContact()) {
        return;
    }

    env.emit('BallLost', { position: { x: env.ball.position.x, y: env.ball.position.y } });
    onBallLost();
};
