import { z } from 'zod';
import { ConfigurationError } from '../../errors/MatchDomainErrors';
import type { GameInfo, GameOutcome, MatchState, TurnDirective } from '../../types/match';
import { GameEngine, type EngineConfiguration, type EngineContext } from '../GameEngine';
import { withTimingRules } from '../rules/ruleDescriptor';

const MarkSchema = z.enum(['X', 'O']);
export type Mark = z.infer<typeof MarkSchema>;

export const TicTacToePayloadSchema = z.object({
  board: z.array(z.array(MarkSchema.nullable())),
  boardSize: z.number().int(),
  winLength: z.number().int(),
  marks: z.record(z.string(), MarkSchema),
});
export type TicTacToePayload = z.infer<typeof TicTacToePayloadSchema>;

export const TicTacToeMoveSchema = z.object({
  row: z.number().int(),
  col: z.number().int(),
});
export type TicTacToeMove = z.infer<typeof TicTacToeMoveSchema>;

export type TicTacToeState = MatchState<'tictactoe', TicTacToePayload, TicTacToeMove>;

export const TICTACTOE_INFO = {
  kind: 'tictactoe',
  displayName: 'Tic-Tac-Toe',
  description: 'Get K marks in a row on an N×N grid before your opponent does.',
  minPlayers: 2,
  maxPlayers: 2,
  category: 'strategy',
  turnBased: true,
  supportedRules: withTimingRules({
    boardSize: {
      type: 'integer',
      min: 3,
      max: 5,
      default: 3,
      description: 'Size of the game board (NxN)',
    },
    winLength: {
      type: 'integer',
      min: 3,
      max: 5,
      default: 3,
      description: 'Number of marks in a row needed to win',
    },
  }),
} as const satisfies GameInfo;

// Row/column steps for the four line orientations.
const LINE_DIRECTIONS: ReadonlyArray<readonly [number, number]> = [
  [0, 1],
  [1, 0],
  [1, 1],
  [1, -1],
];

export class TicTacToeEngine extends GameEngine<'tictactoe', TicTacToePayload, TicTacToeMove> {
  protected readonly payloadSchema = TicTacToePayloadSchema;
  protected readonly moveSchema = TicTacToeMoveSchema;

  readonly boardSize: number;
  readonly winLength: number;

  constructor(configuration: EngineConfiguration, context?: EngineContext) {
    super(TICTACTOE_INFO, configuration, context);
    this.boardSize = this.numberRule('boardSize');
    this.winLength = this.numberRule('winLength');
    if (this.winLength > this.boardSize) {
      throw new ConfigurationError('winLength cannot exceed boardSize', {
        boardSize: this.boardSize,
        winLength: this.winLength,
      });
    }
  }

  protected initializeKindState(): TicTacToePayload {
    const [first, second] = this.participants;
    return {
      board: Array.from({ length: this.boardSize }, () =>
        Array.from({ length: this.boardSize }, (): Mark | null => null)
      ),
      boardSize: this.boardSize,
      winLength: this.winLength,
      marks: { [first]: 'X', [second]: 'O' },
    };
  }

  protected validateKindMove(state: TicTacToeState, _participantId: string, move: TicTacToeMove): string | null {
    const size = state.payload.boardSize;
    if (move.row < 0 || move.row >= size || move.col < 0 || move.col >= size) {
      return `Position (${move.row}, ${move.col}) is outside the ${size}x${size} board`;
    }
    if (state.payload.board[move.row][move.col] !== null) {
      return 'Cell is already occupied';
    }
    return null;
  }

  protected applyKindMove(state: TicTacToeState, participantId: string, move: TicTacToeMove): TurnDirective {
    state.payload.board[move.row][move.col] = state.payload.marks[participantId];
    return 'next';
  }

  protected evaluateKindResult(state: TicTacToeState): GameOutcome {
    const { board, marks } = state.payload;
    const winningMark = this.findLine(board, state.payload.winLength);
    if (winningMark !== null) {
      const winner = Object.keys(marks).find((id) => marks[id] === winningMark) ?? null;
      return { result: 'player_win', winnerIdentifier: winner };
    }
    if (board.every((row) => row.every((cell) => cell !== null))) {
      return { result: 'draw', winnerIdentifier: null };
    }
    return { result: 'in_progress', winnerIdentifier: null };
  }

  /**
   * Scan every cell as the start of a run in each orientation. Covers all
   * diagonals, not only the two main ones, so K < N boards work.
   */
  private findLine(board: Array<Array<Mark | null>>, length: number): Mark | null {
    const size = board.length;
    for (let row = 0; row < size; row++) {
      for (let col = 0; col < size; col++) {
        const mark = board[row][col];
        if (mark === null) continue;
        for (const [dr, dc] of LINE_DIRECTIONS) {
          const endRow = row + dr * (length - 1);
          const endCol = col + dc * (length - 1);
          if (endRow < 0 || endRow >= size || endCol < 0 || endCol >= size) continue;
          let run = 1;
          while (run < length && board[row + dr * run][col + dc * run] === mark) {
            run++;
          }
          if (run === length) {
            return mark;
          }
        }
      }
    }
    return null;
  }
}
