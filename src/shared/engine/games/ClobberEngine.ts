import { z } from 'zod';
import type { GameInfo, GameOutcome, MatchState, TurnDirective } from '../../types/match';
import { GameEngine, type EngineConfiguration, type EngineContext } from '../GameEngine';
import { withTimingRules } from '../rules/ruleDescriptor';

const StoneSchema = z.enum(['W', 'B']);
export type Stone = z.infer<typeof StoneSchema>;

export const ClobberPayloadSchema = z.object({
  board: z.array(z.array(StoneSchema.nullable())),
  width: z.number().int(),
  height: z.number().int(),
  stones: z.record(z.string(), StoneSchema),
});
export type ClobberPayload = z.infer<typeof ClobberPayloadSchema>;

export const ClobberMoveSchema = z.object({
  fromRow: z.number().int(),
  fromCol: z.number().int(),
  toRow: z.number().int(),
  toCol: z.number().int(),
});
export type ClobberMove = z.infer<typeof ClobberMoveSchema>;

export type ClobberState = MatchState<'clobber', ClobberPayload, ClobberMove>;

export const CLOBBER_INFO = {
  kind: 'clobber',
  displayName: 'Clobber',
  description:
    'Move a stone onto an orthogonally adjacent enemy stone to capture it. The player left without a capture loses.',
  minPlayers: 2,
  maxPlayers: 2,
  category: 'strategy',
  turnBased: true,
  supportedRules: withTimingRules(
    {
      boardWidth: {
        type: 'integer',
        min: 4,
        max: 10,
        default: 6,
        description: 'Number of columns',
      },
      boardHeight: {
        type: 'integer',
        min: 4,
        max: 10,
        default: 5,
        description: 'Number of rows',
      },
      startingPattern: {
        type: 'string',
        allowedValues: ['checkerboard', 'rows'],
        default: 'checkerboard',
        description: 'Initial layout: alternating cells or alternating rows',
      },
    },
    { allowedValues: [10, 15, 30, 60, 120, 300, 600] }
  ),
} as const satisfies GameInfo;

const ORTHOGONAL: ReadonlyArray<readonly [number, number]> = [
  [-1, 0],
  [1, 0],
  [0, -1],
  [0, 1],
];

export class ClobberEngine extends GameEngine<'clobber', ClobberPayload, ClobberMove> {
  protected readonly payloadSchema = ClobberPayloadSchema;
  protected readonly moveSchema = ClobberMoveSchema;

  readonly width: number;
  readonly height: number;
  readonly startingPattern: 'checkerboard' | 'rows';

  constructor(configuration: EngineConfiguration, context?: EngineContext) {
    super(CLOBBER_INFO, configuration, context);
    this.width = this.numberRule('boardWidth');
    this.height = this.numberRule('boardHeight');
    this.startingPattern = this.stringRule('startingPattern') === 'rows' ? 'rows' : 'checkerboard';
  }

  protected initializeKindState(): ClobberPayload {
    const [white, black] = this.participants;
    const board = Array.from({ length: this.height }, (_, row) =>
      Array.from({ length: this.width }, (_, col): Stone | null => {
        const whiteCell = this.startingPattern === 'rows' ? row % 2 === 0 : (row + col) % 2 === 0;
        return whiteCell ? 'W' : 'B';
      })
    );
    return {
      board,
      width: this.width,
      height: this.height,
      stones: { [white]: 'W', [black]: 'B' },
    };
  }

  protected validateKindMove(state: ClobberState, participantId: string, move: ClobberMove): string | null {
    const { board, width, height, stones } = state.payload;
    const inside = (row: number, col: number) => row >= 0 && row < height && col >= 0 && col < width;
    if (!inside(move.fromRow, move.fromCol) || !inside(move.toRow, move.toCol)) {
      return 'Position out of bounds';
    }
    const own = stones[participantId];
    if (board[move.fromRow][move.fromCol] !== own) {
      return 'No piece of yours at starting position';
    }
    if (Math.abs(move.toRow - move.fromRow) + Math.abs(move.toCol - move.fromCol) !== 1) {
      return 'Can only move to orthogonally adjacent cells';
    }
    const target = board[move.toRow][move.toCol];
    if (target === null || target === own) {
      return "Can only move onto opponent's pieces (must capture)";
    }
    return null;
  }

  protected applyKindMove(state: ClobberState, _participantId: string, move: ClobberMove): TurnDirective {
    const board = state.payload.board;
    board[move.toRow][move.toCol] = board[move.fromRow][move.fromCol];
    board[move.fromRow][move.fromCol] = null;
    return 'next';
  }

  protected evaluateKindResult(state: ClobberState): GameOutcome {
    const toMove = state.currentTurnIdentifier;
    if (this.hasCapture(state.payload, state.payload.stones[toMove])) {
      return { result: 'in_progress', winnerIdentifier: null };
    }
    return { result: 'player_win', winnerIdentifier: this.opponentOf(toMove) };
  }

  hasCapture(payload: ClobberPayload, stone: Stone): boolean {
    const { board, width, height } = payload;
    for (let row = 0; row < height; row++) {
      for (let col = 0; col < width; col++) {
        if (board[row][col] !== stone) continue;
        for (const [dr, dc] of ORTHOGONAL) {
          const r = row + dr;
          const c = col + dc;
          if (r < 0 || r >= height || c < 0 || c >= width) continue;
          const neighbour = board[r][c];
          if (neighbour !== null && neighbour !== stone) {
            return true;
          }
        }
      }
    }
    return false;
  }
}
