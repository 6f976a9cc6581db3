import { z } from 'zod';
import type { GameInfo, GameOutcome, MatchState, TurnDirective } from '../../types/match';
import { GameEngine, type EngineConfiguration, type EngineContext } from '../GameEngine';
import { withTimingRules } from '../rules/ruleDescriptor';

/**
 * Paper soccer. The ball sits on lattice nodes of a W×H field; each move
 * draws a line to one of the eight neighbours. No segment may be drawn
 * twice and none may run along the wall. Bouncing (landing on a node that
 * already has a line, or on the wall) earns another move.
 */

export const DIRECTIONS = {
  N: [0, -1],
  NE: [1, -1],
  E: [1, 0],
  SE: [1, 1],
  S: [0, 1],
  SW: [-1, 1],
  W: [-1, 0],
  NW: [-1, -1],
} as const satisfies Record<string, readonly [number, number]>;

export type Direction = keyof typeof DIRECTIONS;
const DirectionSchema = z.enum(['N', 'NE', 'E', 'SE', 'S', 'SW', 'W', 'NW']);

export const PITCH_SIZES = {
  small: { width: 7, height: 9, goalWidth: 3 },
  medium: { width: 9, height: 13, goalWidth: 3 },
  large: { width: 11, height: 17, goalWidth: 5 },
} as const;
export type PitchSize = keyof typeof PITCH_SIZES;

const PointSchema = z.object({ x: z.number().int(), y: z.number().int() });
export type Point = z.infer<typeof PointSchema>;

export const SoccerPayloadSchema = z.object({
  width: z.number().int(),
  height: z.number().int(),
  goalStart: z.number().int(),
  goalEnd: z.number().int(),
  ball: PointSchema,
  /** Drawn segments as canonical "x1,y1-x2,y2" keys. */
  usedEdges: z.array(z.string()),
  /** Lines touching each node, keyed "x,y". */
  nodeDegrees: z.record(z.string(), z.number().int().nonnegative()),
  lines: z.array(z.object({ from: PointSchema, to: PointSchema, participantId: z.string() })),
  /** Defends the goal above row 0. */
  topDefender: z.string(),
  /** Defends the goal below the last row. */
  bottomDefender: z.string(),
});
export type SoccerPayload = z.infer<typeof SoccerPayloadSchema>;

export const SoccerMoveSchema = z.union([
  z.object({ direction: DirectionSchema }),
  z.object({ toX: z.number().int(), toY: z.number().int() }),
]);
export type SoccerMove = z.infer<typeof SoccerMoveSchema>;

export type SoccerState = MatchState<'soccer', SoccerPayload, SoccerMove>;

export const SOCCER_INFO = {
  kind: 'soccer',
  displayName: 'Paper Soccer',
  description:
    'Draw lines to move the ball across the grid. Bounce off used points and walls to keep moving, and score in the opposing goal.',
  minPlayers: 2,
  maxPlayers: 2,
  category: 'strategy',
  turnBased: true,
  supportedRules: withTimingRules(
    {
      pitchSize: {
        type: 'string',
        allowedValues: ['small', 'medium', 'large'],
        default: 'medium',
        description: 'Field size: small 7x9, medium 9x13, large 11x17',
      },
    },
    { allowedValues: [10, 15, 30, 60, 120, 300, 600] }
  ),
} as const satisfies GameInfo;

export function nodeKey(point: Point): string {
  return `${point.x},${point.y}`;
}

/** Order-independent key for the segment between two nodes. */
export function edgeKey(a: Point, b: Point): string {
  const [first, second] = [nodeKey(a), nodeKey(b)].sort();
  return `${first}-${second}`;
}

function isPitchSize(value: string): value is PitchSize {
  return Object.prototype.hasOwnProperty.call(PITCH_SIZES, value);
}

export class SoccerEngine extends GameEngine<'soccer', SoccerPayload, SoccerMove> {
  protected readonly payloadSchema = SoccerPayloadSchema;
  protected readonly moveSchema = SoccerMoveSchema;

  readonly pitchSize: PitchSize;

  constructor(configuration: EngineConfiguration, context?: EngineContext) {
    super(SOCCER_INFO, configuration, context);
    const size = this.stringRule('pitchSize');
    this.pitchSize = isPitchSize(size) ? size : 'medium';
  }

  protected initializeKindState(): SoccerPayload {
    const { width, height, goalWidth } = PITCH_SIZES[this.pitchSize];
    const goalStart = Math.floor((width - goalWidth) / 2);
    const [top, bottom] = this.participants;
    return {
      width,
      height,
      goalStart,
      goalEnd: goalStart + goalWidth - 1,
      ball: { x: Math.floor(width / 2), y: Math.floor(height / 2) },
      usedEdges: [],
      nodeDegrees: {},
      lines: [],
      topDefender: top,
      bottomDefender: bottom,
    };
  }

  protected validateKindMove(state: SoccerState, _participantId: string, move: SoccerMove): string | null {
    const payload = state.payload;
    const target = this.targetOf(payload.ball, move);
    const dx = target.x - payload.ball.x;
    const dy = target.y - payload.ball.y;
    if ((dx === 0 && dy === 0) || Math.abs(dx) > 1 || Math.abs(dy) > 1) {
      return 'Ball can only move to an adjacent point';
    }
    if (!this.isReachable(payload, target)) {
      return 'Move would leave the field';
    }
    if (this.isWallSegment(payload, payload.ball, target)) {
      return 'Cannot move along the edge of the field';
    }
    if (payload.usedEdges.includes(edgeKey(payload.ball, target))) {
      return 'Line already drawn';
    }
    return null;
  }

  protected applyKindMove(state: SoccerState, participantId: string, move: SoccerMove): TurnDirective {
    const payload = state.payload;
    const from = payload.ball;
    const to = this.targetOf(from, move);
    const bounce = (payload.nodeDegrees[nodeKey(to)] ?? 0) > 0 || this.isBoundaryNode(payload, to);

    payload.usedEdges.push(edgeKey(from, to));
    payload.nodeDegrees[nodeKey(from)] = (payload.nodeDegrees[nodeKey(from)] ?? 0) + 1;
    payload.nodeDegrees[nodeKey(to)] = (payload.nodeDegrees[nodeKey(to)] ?? 0) + 1;
    payload.lines.push({ from, to, participantId });
    payload.ball = to;

    return bounce && !this.isGoal(payload, to) ? 'extra_turn' : 'next';
  }

  protected evaluateKindResult(state: SoccerState): GameOutcome {
    const payload = state.payload;
    if (payload.ball.y < 0) {
      return { result: 'player_win', winnerIdentifier: payload.bottomDefender };
    }
    if (payload.ball.y >= payload.height) {
      return { result: 'player_win', winnerIdentifier: payload.topDefender };
    }
    if (this.legalTargets(payload).length === 0) {
      return { result: 'player_win', winnerIdentifier: this.opponentOf(state.currentTurnIdentifier) };
    }
    return { result: 'in_progress', winnerIdentifier: null };
  }

  /** Every node the ball can move to from where it is now. */
  legalTargets(payload: SoccerPayload): Point[] {
    const targets: Point[] = [];
    for (const [dx, dy] of Object.values(DIRECTIONS)) {
      const target = { x: payload.ball.x + dx, y: payload.ball.y + dy };
      if (
        this.isReachable(payload, target) &&
        !this.isWallSegment(payload, payload.ball, target) &&
        !payload.usedEdges.includes(edgeKey(payload.ball, target))
      ) {
        targets.push(target);
      }
    }
    return targets;
  }

  private targetOf(ball: Point, move: SoccerMove): Point {
    if ('direction' in move) {
      const [dx, dy] = DIRECTIONS[move.direction];
      return { x: ball.x + dx, y: ball.y + dy };
    }
    return { x: move.toX, y: move.toY };
  }

  private inGoalMouth(payload: SoccerPayload, x: number): boolean {
    return x >= payload.goalStart && x <= payload.goalEnd;
  }

  private isGoal(payload: SoccerPayload, point: Point): boolean {
    return (point.y === -1 || point.y === payload.height) && this.inGoalMouth(payload, point.x);
  }

  /** Inside the field, or a goal node reached through the goal mouth. */
  private isReachable(payload: SoccerPayload, point: Point): boolean {
    if (this.isGoal(payload, point)) {
      return this.inGoalMouth(payload, payload.ball.x);
    }
    return point.x >= 0 && point.x < payload.width && point.y >= 0 && point.y < payload.height;
  }

  /** Side walls, plus the end rows outside the goal mouth (posts included). */
  isBoundaryNode(payload: SoccerPayload, point: Point): boolean {
    if (point.x === 0 || point.x === payload.width - 1) {
      return true;
    }
    const endRow = point.y === 0 || point.y === payload.height - 1;
    return endRow && (point.x <= payload.goalStart || point.x >= payload.goalEnd);
  }

  /**
   * A segment lying on the field's wall. The end rows between the posts are
   * the goal line, which is playable.
   */
  private isWallSegment(payload: SoccerPayload, a: Point, b: Point): boolean {
    if (a.x === b.x) {
      return a.x === 0 || a.x === payload.width - 1;
    }
    if (a.y === b.y && (a.y === 0 || a.y === payload.height - 1)) {
      const left = Math.min(a.x, b.x);
      const right = Math.max(a.x, b.x);
      return left < payload.goalStart || right > payload.goalEnd;
    }
    return false;
  }
}
