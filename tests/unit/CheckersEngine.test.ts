import { MatchErrorCode } from '../../src/shared/errors/MatchDomainErrors';
import {
  CheckersEngine,
  type Board,
  type CheckersMove,
  type CheckersPiece,
  type CheckersState,
} from '../../src/shared/engine/games/CheckersEngine';
import type { RuleOverrides } from '../../src/shared/types/match';
import { createControlledContext } from '../helpers/engineContext';

function newEngine(rules?: RuleOverrides) {
  return new CheckersEngine(
    { matchId: 'checkers-1', participants: ['white', 'black'], rules },
    createControlledContext()
  );
}

function emptyBoard(size = 8): Board {
  return Array.from({ length: size }, () => Array.from({ length: size }, (): CheckersPiece | null => null));
}

/** Fresh state with only the listed pieces on the board. */
function withPieces(
  engine: CheckersEngine,
  pieces: Array<[row: number, col: number, piece: CheckersPiece]>
): CheckersState {
  const state = engine.initializeState();
  const board = emptyBoard(state.payload.boardSize);
  for (const [row, col, piece] of pieces) {
    board[row][col] = piece;
  }
  state.payload.board = board;
  return state;
}

function play(engine: CheckersEngine, state: CheckersState, moves: CheckersMove[]): CheckersState {
  let current = state;
  for (const move of moves) {
    const mover = engine.currentParticipant;
    const validation = engine.validateMove(current, mover, move);
    if (!validation.valid) {
      throw new Error(`unexpected rejection: ${validation.error}`);
    }
    current = engine.completeMove(current, mover, validation.move);
  }
  return current;
}

function count(board: Board, pieces: CheckersPiece[]): number {
  return board.flat().filter((cell) => cell !== null && pieces.includes(cell)).length;
}

describe('CheckersEngine', () => {
  it.each([
    [8, 12],
    [10, 20],
  ])('sets up a %i-wide board with %i men a side on dark squares', (size, perSide) => {
    const engine = newEngine({ boardSize: size });
    const { board } = engine.initializeState().payload;

    expect(count(board, ['w'])).toBe(perSide);
    expect(count(board, ['b'])).toBe(perSide);
    board.forEach((cells, row) =>
      cells.forEach((cell, col) => {
        if (cell !== null) {
          expect((row + col) % 2).toBe(1);
        }
      })
    );
  });

  it('assigns white to the first participant, who moves first', () => {
    const engine = newEngine();
    const state = engine.initializeState();

    expect(state.payload.colors).toEqual({ white: 'white', black: 'black' });
    expect(state.currentTurnIdentifier).toBe('white');
  });

  it('moves a man one square diagonally forward', () => {
    const engine = newEngine();
    const state = engine.initializeState();

    const next = engine.completeMove(state, 'white', { fromRow: 5, fromCol: 0, toRow: 4, toCol: 1 });

    expect(next.payload.board[5][0]).toBeNull();
    expect(next.payload.board[4][1]).toBe('w');
    expect(next.currentTurnIdentifier).toBe('black');
    expect(next.payload.nonCaptureStreak).toBe(1);
    expect(next.payload.positionHistory).toHaveLength(1);
  });

  it('rejects a man stepping backwards', () => {
    const engine = newEngine();
    const state = withPieces(engine, [
      [4, 3, 'w'],
      [0, 7, 'b'],
    ]);

    expect(engine.validateMove(state, 'white', { fromRow: 4, fromCol: 3, toRow: 5, toCol: 4 })).toEqual({
      valid: false,
      code: MatchErrorCode.MOVE_ILLEGAL,
      error: 'Men move one square diagonally forward',
    });
  });

  describe('captures', () => {
    const position: Array<[number, number, CheckersPiece]> = [
      [5, 2, 'w'],
      [4, 3, 'b'],
      [5, 6, 'w'],
      [0, 7, 'b'],
    ];

    it('forces a capture when one is available', () => {
      const engine = newEngine();
      const state = withPieces(engine, position);

      expect(engine.validateMove(state, 'white', { fromRow: 5, fromCol: 6, toRow: 4, toCol: 5 })).toEqual({
        valid: false,
        code: MatchErrorCode.MOVE_ILLEGAL,
        error: 'Must capture when possible',
      });

      const next = engine.completeMove(state, 'white', { fromRow: 5, fromCol: 2, toRow: 3, toCol: 4 });
      expect(next.payload.board[4][3]).toBeNull();
      expect(next.payload.board[3][4]).toBe('w');
      expect(next.payload.nonCaptureStreak).toBe(0);
      expect(next.currentTurnIdentifier).toBe('black');
    });

    it('allows a quiet move when captures are optional', () => {
      const engine = newEngine({ forcedCapture: 'No' });
      const state = withPieces(engine, position);

      expect(engine.validateMove(state, 'white', { fromRow: 5, fromCol: 6, toRow: 4, toCol: 5 }).valid).toBe(true);
    });

    it('keeps the turn while the same piece can capture again', () => {
      const engine = newEngine();
      const state = withPieces(engine, [
        [6, 1, 'w'],
        [5, 2, 'b'],
        [3, 4, 'b'],
        [0, 7, 'b'],
        [7, 6, 'w'],
      ]);

      const first = engine.completeMove(state, 'white', { fromRow: 6, fromCol: 1, toRow: 4, toCol: 3 });
      expect(first.currentTurnIdentifier).toBe('white');
      expect(first.payload.pendingCapture).toEqual({ row: 4, col: 3 });
      expect(first.result).toBe('in_progress');

      expect(engine.validateMove(first, 'white', { fromRow: 7, fromCol: 6, toRow: 6, toCol: 5 })).toEqual({
        valid: false,
        code: MatchErrorCode.MOVE_ILLEGAL,
        error: 'You must continue capturing with the same piece',
      });

      const second = engine.completeMove(first, 'white', { fromRow: 4, fromCol: 3, toRow: 2, toCol: 5 });
      expect(second.payload.pendingCapture).toBeNull();
      expect(second.payload.board[3][4]).toBeNull();
      expect(second.payload.board[2][5]).toBe('w');
      expect(second.currentTurnIdentifier).toBe('black');
      expect(second.moveCount).toBe(2);
    });

    it('wins when the last opposing piece is captured', () => {
      const engine = newEngine();
      const state = withPieces(engine, [
        [5, 2, 'w'],
        [4, 3, 'b'],
      ]);

      const next = engine.completeMove(state, 'white', { fromRow: 5, fromCol: 2, toRow: 3, toCol: 4 });

      expect(next.result).toBe('player_win');
      expect(next.winnerIdentifier).toBe('white');
    });
  });

  it('crowns a man reaching the far row', () => {
    const engine = newEngine();
    const state = withPieces(engine, [
      [1, 2, 'w'],
      [3, 6, 'b'],
    ]);

    const next = engine.completeMove(state, 'white', { fromRow: 1, fromCol: 2, toRow: 0, toCol: 1 });

    expect(next.payload.board[0][1]).toBe('W');
  });

  it('draws after forty moves without a capture', () => {
    const engine = newEngine();
    const state = withPieces(engine, [
      [5, 2, 'w'],
      [0, 7, 'b'],
    ]);
    state.payload.nonCaptureStreak = 39;

    const next = engine.completeMove(state, 'white', { fromRow: 5, fromCol: 2, toRow: 4, toCol: 3 });

    expect(next.result).toBe('draw');
    expect(next.winnerIdentifier).toBeNull();
  });

  it('lists only the pending piece continuation as legal', () => {
    const engine = newEngine();
    const state = withPieces(engine, [
      [4, 3, 'w'],
      [3, 4, 'b'],
      [6, 1, 'w'],
    ]);
    state.payload.pendingCapture = { row: 4, col: 3 };

    expect(engine.legalMoves(state.payload, 'white')).toEqual([
      { from: { row: 4, col: 3 }, to: { row: 2, col: 5 }, captured: { row: 3, col: 4 } },
    ]);
  });
  describe('flying kings', () => {
    const position: Array<[number, number, CheckersPiece]> = [
      [7, 0, 'W'],
      [3, 4, 'b'],
      [0, 3, 'b'],
    ];

    it('captures from a distance and may land on any free square beyond', () => {
      const engine = newEngine({ flyingKings: 'Yes' });
      const state = withPieces(engine, position);

      for (const [toRow, toCol] of [
        [2, 5],
        [1, 6],
        [0, 7],
      ]) {
        expect(engine.validateMove(state, 'white', { fromRow: 7, fromCol: 0, toRow, toCol }).valid).toBe(true);
      }

      const next = engine.completeMove(state, 'white', { fromRow: 7, fromCol: 0, toRow: 1, toCol: 6 });
      expect(next.payload.board[3][4]).toBeNull();
      expect(next.payload.board[1][6]).toBe('W');
      expect(next.payload.pendingCapture).toBeNull();
      expect(next.currentTurnIdentifier).toBe('black');
      expect(next.result).toBe('in_progress');
    });

    it('rejects a quiet king move while a long capture is available', () => {
      const engine = newEngine({ flyingKings: 'Yes' });
      const state = withPieces(engine, position);

      expect(engine.validateMove(state, 'white', { fromRow: 7, fromCol: 0, toRow: 6, toCol: 1 })).toEqual({
        valid: false,
        code: MatchErrorCode.MOVE_ILLEGAL,
        error: 'Must capture when possible',
      });
    });
  });

  it('draws when the same position occurs a third time', () => {
    const engine = newEngine();
    const state = withPieces(engine, [
      [7, 0, 'W'],
      [0, 1, 'B'],
    ]);
    const shuffle: CheckersMove[] = [
      { fromRow: 7, fromCol: 0, toRow: 6, toCol: 1 },
      { fromRow: 0, fromCol: 1, toRow: 1, toCol: 0 },
      { fromRow: 6, fromCol: 1, toRow: 7, toCol: 0 },
      { fromRow: 1, fromCol: 0, toRow: 0, toCol: 1 },
    ];

    const beforeThird = play(engine, state, [...shuffle, ...shuffle]);
    expect(beforeThird.result).toBe('in_progress');

    const next = play(engine, beforeThird, [shuffle[0]]);
    expect(next.moveCount).toBe(9);
    expect(next.result).toBe('draw');
    expect(next.winnerIdentifier).toBeNull();
  });

  it('loses for the side to move when its pieces are all blocked', () => {
    const engine = newEngine();
    const state = withPieces(engine, [
      [0, 1, 'b'],
      [1, 0, 'w'],
      [1, 2, 'w'],
      [2, 3, 'w'],
      [5, 4, 'w'],
    ]);

    const next = engine.completeMove(state, 'white', { fromRow: 5, fromCol: 4, toRow: 4, toCol: 5 });

    expect(count(next.payload.board, ['b'])).toBe(1);
    expect(engine.legalMoves(next.payload, 'black')).toEqual([]);
    expect(next.result).toBe('player_win');
    expect(next.winnerIdentifier).toBe('white');
  });
});
