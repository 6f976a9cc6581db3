import { z } from 'zod';
import type { GameInfo, GameOutcome, MatchState, TurnDirective } from '../../types/match';
import { GameEngine, type EngineConfiguration, type EngineContext } from '../GameEngine';
import { withTimingRules } from '../rules/ruleDescriptor';

/** w/b = man, W/B = king. */
const PieceSchema = z.enum(['w', 'W', 'b', 'B']);
export type CheckersPiece = z.infer<typeof PieceSchema>;

const ColorSchema = z.enum(['white', 'black']);
export type CheckersColor = z.infer<typeof ColorSchema>;

const SquareSchema = z.object({ row: z.number().int(), col: z.number().int() });
export type Square = z.infer<typeof SquareSchema>;

export const CheckersPayloadSchema = z.object({
  board: z.array(z.array(PieceSchema.nullable())),
  boardSize: z.number().int(),
  colors: z.record(z.string(), ColorSchema),
  nonCaptureStreak: z.number().int().nonnegative(),
  positionHistory: z.array(z.string()),
  /** Piece that captured and must keep capturing before the turn ends. */
  pendingCapture: SquareSchema.nullable(),
});
export type CheckersPayload = z.infer<typeof CheckersPayloadSchema>;

export const CheckersMoveSchema = z.object({
  fromRow: z.number().int(),
  fromCol: z.number().int(),
  toRow: z.number().int(),
  toCol: z.number().int(),
});
export type CheckersMove = z.infer<typeof CheckersMoveSchema>;

export type CheckersState = MatchState<'checkers', CheckersPayload, CheckersMove>;

export type Board = CheckersPayload['board'];

export interface CandidateMove {
  from: Square;
  to: Square;
  captured: Square | null;
}

const REPETITION_LIMIT = 3;
const NON_CAPTURE_LIMIT = 40;

const DIAGONALS: ReadonlyArray<readonly [number, number]> = [
  [-1, -1],
  [-1, 1],
  [1, -1],
  [1, 1],
];

const yesNo = (defaultValue: 'Yes' | 'No', description: string) =>
  ({ type: 'string', allowedValues: ['Yes', 'No'], default: defaultValue, description }) as const;

export const CHECKERS_INFO = {
  kind: 'checkers',
  displayName: 'Checkers',
  description:
    'Capture by jumping diagonally; reach the far rank to crown a king. A player who cannot move loses.',
  minPlayers: 2,
  maxPlayers: 2,
  category: 'strategy',
  turnBased: true,
  supportedRules: withTimingRules(
    {
      boardSize: {
        type: 'integer',
        allowedValues: [8, 10],
        default: 8,
        description: 'Board size: 8 for standard checkers, 10 for international',
      },
      forcedCapture: yesNo('Yes', 'Whether captures are mandatory'),
      flyingKings: yesNo('No', 'Whether kings move and capture along whole diagonals'),
      backwardCapture: yesNo('Yes', 'Whether men may capture backwards'),
    },
    { allowedValues: [10, 15, 30, 60, 120, 300, 600] }
  ),
} as const satisfies GameInfo;

function colorOf(piece: CheckersPiece): CheckersColor {
  return piece === 'w' || piece === 'W' ? 'white' : 'black';
}

function isKing(piece: CheckersPiece): boolean {
  return piece === 'W' || piece === 'B';
}

export function hashBoard(board: Board): string {
  return board.map((row) => row.map((cell) => cell ?? '.').join('')).join('/');
}

export class CheckersEngine extends GameEngine<'checkers', CheckersPayload, CheckersMove> {
  protected readonly payloadSchema = CheckersPayloadSchema;
  protected readonly moveSchema = CheckersMoveSchema;

  readonly boardSize: number;
  readonly forcedCapture: boolean;
  readonly flyingKings: boolean;
  readonly backwardCapture: boolean;

  constructor(configuration: EngineConfiguration, context?: EngineContext) {
    super(CHECKERS_INFO, configuration, context);
    this.boardSize = this.numberRule('boardSize');
    this.forcedCapture = this.flagRule('forcedCapture');
    this.flyingKings = this.flagRule('flyingKings');
    this.backwardCapture = this.flagRule('backwardCapture');
  }

  protected initializeKindState(): CheckersPayload {
    const size = this.boardSize;
    const pieceRows = size === 8 ? 3 : 4;
    const board: Board = Array.from({ length: size }, (_, row) =>
      Array.from({ length: size }, (__, col): CheckersPiece | null => {
        if ((row + col) % 2 === 0) return null;
        if (row < pieceRows) return 'b';
        if (row >= size - pieceRows) return 'w';
        return null;
      })
    );
    const [white, black] = this.participants;
    return {
      board,
      boardSize: size,
      colors: { [white]: 'white', [black]: 'black' },
      nonCaptureStreak: 0,
      positionHistory: [],
      pendingCapture: null,
    };
  }

  protected validateKindMove(state: CheckersState, participantId: string, move: CheckersMove): string | null {
    const { board, colors, pendingCapture } = state.payload;
    const color = colors[participantId];
    const from = { row: move.fromRow, col: move.fromCol };
    const to = { row: move.toRow, col: move.toCol };

    if (!this.inBounds(board, from) || !this.inBounds(board, to)) {
      return 'Position out of bounds';
    }
    const piece = board[from.row][from.col];
    if (piece === null || colorOf(piece) !== color) {
      return 'No piece of yours at starting position';
    }
    if (board[to.row][to.col] !== null) {
      return 'Destination square is occupied';
    }
    if (Math.abs(to.row - from.row) !== Math.abs(to.col - from.col) || to.row === from.row) {
      return 'Must move diagonally';
    }

    if (pendingCapture !== null) {
      if (pendingCapture.row !== from.row || pendingCapture.col !== from.col) {
        return 'You must continue capturing with the same piece';
      }
      if (!this.findCandidate(this.capturesFrom(board, from), to)) {
        return 'You must continue capturing with the same piece';
      }
      return null;
    }

    const captures = this.capturesFrom(board, from);
    if (this.findCandidate(captures, to)) {
      return null;
    }
    if (this.forcedCapture && this.allCaptures(board, color).length > 0) {
      return 'Must capture when possible';
    }
    if (!this.findCandidate(this.quietMovesFrom(board, from), to)) {
      return isKing(piece) ? 'Illegal king move' : 'Men move one square diagonally forward';
    }
    return null;
  }

  protected applyKindMove(state: CheckersState, participantId: string, move: CheckersMove): TurnDirective {
    const payload = state.payload;
    const board = payload.board;
    const from = { row: move.fromRow, col: move.fromCol };
    const to = { row: move.toRow, col: move.toCol };
    const piece = board[from.row][from.col];
    if (piece === null) {
      return 'next';
    }

    const capture = this.findCandidate(this.capturesFrom(board, from), to);
    board[from.row][from.col] = null;
    if (capture?.captured) {
      board[capture.captured.row][capture.captured.col] = null;
    }

    let placed: CheckersPiece = piece;
    const color = payload.colors[participantId];
    if (!isKing(piece)) {
      if (color === 'white' && to.row === 0) placed = 'W';
      if (color === 'black' && to.row === payload.boardSize - 1) placed = 'B';
    }
    board[to.row][to.col] = placed;

    payload.nonCaptureStreak = capture ? 0 : payload.nonCaptureStreak + 1;
    payload.positionHistory.push(hashBoard(board));

    // Crowning ends the move; otherwise a capturing piece keeps jumping.
    if (capture && placed === piece && this.capturesFrom(board, to).length > 0) {
      payload.pendingCapture = to;
      return 'continue';
    }
    payload.pendingCapture = null;
    return 'next';
  }

  protected evaluateKindResult(state: CheckersState): GameOutcome {
    const { board, colors, positionHistory, nonCaptureStreak } = state.payload;

    const latest = positionHistory[positionHistory.length - 1];
    if (latest !== undefined) {
      const repetitions = positionHistory.filter((hash) => hash === latest).length;
      if (repetitions >= REPETITION_LIMIT) {
        return { result: 'draw', winnerIdentifier: null };
      }
    }
    if (nonCaptureStreak >= NON_CAPTURE_LIMIT) {
      return { result: 'draw', winnerIdentifier: null };
    }

    const toMove = state.currentTurnIdentifier;
    const opponent = this.opponentOf(toMove);
    if (this.countPieces(board, colors[opponent]) === 0) {
      return { result: 'player_win', winnerIdentifier: toMove };
    }
    if (this.countPieces(board, colors[toMove]) === 0 || !this.hasAnyMove(state.payload, colors[toMove])) {
      return { result: 'player_win', winnerIdentifier: opponent };
    }
    return { result: 'in_progress', winnerIdentifier: null };
  }

  protected onTurnSkipped(payload: CheckersPayload): CheckersPayload {
    return { ...payload, pendingCapture: null };
  }

  /** Every move the side may legally play in this position. */
  legalMoves(payload: CheckersPayload, color: CheckersColor): CandidateMove[] {
    const { board, pendingCapture } = payload;
    if (pendingCapture !== null) {
      return this.capturesFrom(board, pendingCapture);
    }
    const captures = this.allCaptures(board, color);
    if (this.forcedCapture && captures.length > 0) {
      return captures;
    }
    const quiet = this.ownSquares(board, color).flatMap((square) => this.quietMovesFrom(board, square));
    return [...captures, ...quiet];
  }

  private hasAnyMove(payload: CheckersPayload, color: CheckersColor): boolean {
    return this.legalMoves(payload, color).length > 0;
  }

  private allCaptures(board: Board, color: CheckersColor): CandidateMove[] {
    return this.ownSquares(board, color).flatMap((square) => this.capturesFrom(board, square));
  }

  private capturesFrom(board: Board, from: Square): CandidateMove[] {
    const piece = board[from.row][from.col];
    if (piece === null) return [];
    const color = colorOf(piece);
    const forward = color === 'white' ? -1 : 1;
    const moves: CandidateMove[] = [];

    for (const [dr, dc] of DIAGONALS) {
      if (isKing(piece) && this.flyingKings) {
        // Slide to the first occupied square; it must be an enemy with free squares behind.
        let distance = 1;
        let square = { row: from.row + dr, col: from.col + dc };
        while (this.inBounds(board, square) && board[square.row][square.col] === null) {
          distance++;
          square = { row: from.row + dr * distance, col: from.col + dc * distance };
        }
        if (!this.inBounds(board, square)) continue;
        const target = board[square.row][square.col];
        if (target === null || colorOf(target) === color) continue;
        const captured = square;
        let landing = { row: captured.row + dr, col: captured.col + dc };
        while (this.inBounds(board, landing) && board[landing.row][landing.col] === null) {
          moves.push({ from, to: landing, captured });
          landing = { row: landing.row + dr, col: landing.col + dc };
        }
        continue;
      }

      if (!isKing(piece) && !this.backwardCapture && dr !== forward) continue;
      const middle = { row: from.row + dr, col: from.col + dc };
      const landing = { row: from.row + 2 * dr, col: from.col + 2 * dc };
      if (!this.inBounds(board, landing)) continue;
      const jumped = board[middle.row][middle.col];
      if (jumped === null || colorOf(jumped) === color) continue;
      if (board[landing.row][landing.col] !== null) continue;
      moves.push({ from, to: landing, captured: middle });
    }
    return moves;
  }

  private quietMovesFrom(board: Board, from: Square): CandidateMove[] {
    const piece = board[from.row][from.col];
    if (piece === null) return [];
    const forward = colorOf(piece) === 'white' ? -1 : 1;
    const moves: CandidateMove[] = [];

    for (const [dr, dc] of DIAGONALS) {
      if (!isKing(piece) && dr !== forward) continue;
      const reach = isKing(piece) && this.flyingKings ? board.length : 1;
      for (let step = 1; step <= reach; step++) {
        const to = { row: from.row + dr * step, col: from.col + dc * step };
        if (!this.inBounds(board, to) || board[to.row][to.col] !== null) break;
        moves.push({ from, to, captured: null });
      }
    }
    return moves;
  }

  private ownSquares(board: Board, color: CheckersColor): Square[] {
    const squares: Square[] = [];
    board.forEach((cells, row) =>
      cells.forEach((cell, col) => {
        if (cell !== null && colorOf(cell) === color) squares.push({ row, col });
      })
    );
    return squares;
  }

  private countPieces(board: Board, color: CheckersColor): number {
    return this.ownSquares(board, color).length;
  }

  private findCandidate(candidates: CandidateMove[], to: Square): CandidateMove | undefined {
    return candidates.find((candidate) => candidate.to.row === to.row && candidate.to.col === to.col);
  }

  private inBounds(board: Board, square: Square): boolean {
    return square.row >= 0 && square.row < board.length && square.col >= 0 && square.col < board.length;
  }
}
