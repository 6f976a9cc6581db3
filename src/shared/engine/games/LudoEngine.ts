import { z } from 'zod';
import type { GameInfo, GameOutcome, MatchState, TurnDirective } from '../../types/match';
import { GameEngine, type EngineConfiguration, type EngineContext } from '../GameEngine';
import { withTimingRules } from '../rules/ruleDescriptor';

export const TRACK_LENGTH = 52;
export const HOME_PATH_LENGTH = 6;
export const SAFE_SQUARES: readonly number[] = [0, 8, 13, 21, 26, 34, 39, 47];
/** Track square each seat enters on. */
export const START_SQUARES: readonly number[] = [0, 13, 26, 39];
/** Last track square before each seat turns into its home stretch. */
export const HOME_ENTRY_SQUARES: readonly number[] = [50, 11, 24, 37];

const PositionSchema = z.discriminatedUnion('zone', [
  z.object({ zone: z.literal('yard') }),
  z.object({ zone: z.literal('track'), square: z.number().int().min(0).max(TRACK_LENGTH - 1) }),
  z.object({ zone: z.literal('home'), step: z.number().int().min(0).max(HOME_PATH_LENGTH - 1) }),
  z.object({ zone: z.literal('finished') }),
]);
export type PiecePosition = z.infer<typeof PositionSchema>;

const PieceSchema = z.object({ id: z.string(), position: PositionSchema });
export type LudoPiece = z.infer<typeof PieceSchema>;

const HistoryEntrySchema = z.discriminatedUnion('action', [
  z.object({ action: z.literal('roll_dice'), participantId: z.string(), value: z.number().int() }),
  z.object({
    action: z.literal('move_piece'),
    participantId: z.string(),
    pieceId: z.string(),
    from: PositionSchema,
    to: PositionSchema,
  }),
  z.object({
    action: z.literal('capture'),
    participantId: z.string(),
    capturedOwner: z.string(),
    capturedPiece: z.string(),
  }),
]);
export type LudoHistoryEntry = z.infer<typeof HistoryEntrySchema>;

export const LudoPayloadSchema = z.object({
  pieces: z.record(z.string(), z.array(PieceSchema)),
  seats: z.record(z.string(), z.number().int().min(0).max(3)),
  piecesPerPlayer: z.number().int(),
  /** Roll waiting to be spent this turn; null before rolling. */
  pendingRoll: z.number().int().min(1).max(6).nullable(),
  lastRoll: z.number().int().min(1).max(6).nullable(),
  /** The pending roll was a six and earns another turn. */
  bonusTurn: z.boolean(),
  history: z.array(HistoryEntrySchema),
});
export type LudoPayload = z.infer<typeof LudoPayloadSchema>;

export const LudoMoveSchema = z.discriminatedUnion('action', [
  z.object({ action: z.literal('roll_dice') }),
  z.object({ action: z.literal('move_piece'), pieceId: z.string().min(1) }),
]);
export type LudoMove = z.infer<typeof LudoMoveSchema>;

export type LudoState = MatchState<'ludo', LudoPayload, LudoMove>;

const yesNo = (description: string) =>
  ({ type: 'string', allowedValues: ['yes', 'no'], default: 'yes', description }) as const;

export const LUDO_INFO = {
  kind: 'ludo',
  displayName: 'Ludo',
  description:
    'Roll the die, bring your pieces out of the yard on a six and race them around the track into home.',
  minPlayers: 2,
  maxPlayers: 4,
  category: 'board',
  turnBased: true,
  supportedRules: withTimingRules(
    {
      piecesPerPlayer: {
        type: 'integer',
        allowedValues: [2, 3, 4],
        default: 4,
        description: 'Number of pieces each player races home',
      },
      sixGrantsExtraTurn: yesNo('Rolling a six grants another turn'),
      exactRollToFinish: yesNo('Pieces need an exact roll to reach home'),
      captureSendsHome: yesNo('Landing on an opponent sends it back to the yard'),
    },
    { allowedValues: [30, 60, 120, 300, 600] }
  ),
} as const satisfies GameInfo;

export class LudoEngine extends GameEngine<'ludo', LudoPayload, LudoMove> {
  protected readonly payloadSchema = LudoPayloadSchema;
  protected readonly moveSchema = LudoMoveSchema;

  readonly piecesPerPlayer: number;
  readonly sixGrantsExtraTurn: boolean;
  readonly exactRollToFinish: boolean;
  readonly captureSendsHome: boolean;

  constructor(configuration: EngineConfiguration, context?: EngineContext) {
    super(LUDO_INFO, configuration, context);
    this.piecesPerPlayer = this.numberRule('piecesPerPlayer');
    this.sixGrantsExtraTurn = this.flagRule('sixGrantsExtraTurn');
    this.exactRollToFinish = this.flagRule('exactRollToFinish');
    this.captureSendsHome = this.flagRule('captureSendsHome');
  }

  protected initializeKindState(): LudoPayload {
    const pieces: Record<string, LudoPiece[]> = {};
    const seats: Record<string, number> = {};
    this.participants.forEach((participantId, seat) => {
      seats[participantId] = seat;
      pieces[participantId] = Array.from({ length: this.piecesPerPlayer }, (_, n) => ({
        id: `p${seat}_piece${n}`,
        position: { zone: 'yard' },
      }));
    });
    return {
      pieces,
      seats,
      piecesPerPlayer: this.piecesPerPlayer,
      pendingRoll: null,
      lastRoll: null,
      bonusTurn: false,
      history: [],
    };
  }

  protected validateKindMove(state: LudoState, participantId: string, move: LudoMove): string | null {
    const payload = state.payload;
    if (move.action === 'roll_dice') {
      return payload.pendingRoll === null ? null : 'Dice already rolled this turn';
    }

    if (payload.pendingRoll === null) {
      return 'Must roll dice before moving';
    }
    const piece = payload.pieces[participantId]?.find((candidate) => candidate.id === move.pieceId);
    if (!piece) {
      return `Piece ${move.pieceId} not found`;
    }
    if (this.destination(payload.seats[participantId], piece.position, payload.pendingRoll) === null) {
      return `Piece ${move.pieceId} cannot move with dice roll ${payload.pendingRoll}`;
    }
    return null;
  }

  protected applyKindMove(state: LudoState, participantId: string, move: LudoMove): TurnDirective {
    const payload = state.payload;

    if (move.action === 'roll_dice') {
      const roll = Math.floor(this.context.random() * 6) + 1;
      payload.lastRoll = roll;
      payload.bonusTurn = roll === 6 && this.sixGrantsExtraTurn;
      payload.history.push({ action: 'roll_dice', participantId, value: roll });

      if (this.movablePieces(payload, participantId, roll).length > 0) {
        payload.pendingRoll = roll;
        return 'continue';
      }
      // Nothing can move: the roll is spent, a six still earns the bonus.
      return this.closeTurn(payload);
    }

    const roll = payload.pendingRoll;
    const piece = payload.pieces[participantId]?.find((candidate) => candidate.id === move.pieceId);
    if (roll === null || !piece) {
      return this.closeTurn(payload);
    }
    const from = piece.position;
    const to = this.destination(payload.seats[participantId], from, roll);
    if (to === null) {
      return this.closeTurn(payload);
    }

    if (this.captureSendsHome && to.zone === 'track' && !SAFE_SQUARES.includes(to.square)) {
      for (const [ownerId, ownerPieces] of Object.entries(payload.pieces)) {
        if (ownerId === participantId) continue;
        for (const other of ownerPieces) {
          if (other.position.zone === 'track' && other.position.square === to.square) {
            other.position = { zone: 'yard' };
            payload.history.push({
              action: 'capture',
              participantId,
              capturedOwner: ownerId,
              capturedPiece: other.id,
            });
          }
        }
      }
    }

    piece.position = to;
    payload.history.push({ action: 'move_piece', participantId, pieceId: piece.id, from, to });
    return this.closeTurn(payload);
  }

  protected evaluateKindResult(state: LudoState): GameOutcome {
    for (const participantId of this.participants) {
      const pieces = state.payload.pieces[participantId] ?? [];
      if (pieces.length > 0 && pieces.every((piece) => piece.position.zone === 'finished')) {
        return { result: 'player_win', winnerIdentifier: participantId };
      }
    }
    return { result: 'in_progress', winnerIdentifier: null };
  }

  protected onTurnSkipped(payload: LudoPayload): LudoPayload {
    return { ...payload, pendingRoll: null, bonusTurn: false };
  }

  movablePieces(payload: LudoPayload, participantId: string, roll: number): LudoPiece[] {
    const seat = payload.seats[participantId];
    return (payload.pieces[participantId] ?? []).filter(
      (piece) => this.destination(seat, piece.position, roll) !== null
    );
  }

  /**
   * Where a piece lands after `roll` steps, or null when it cannot move.
   */
  destination(seat: number, position: PiecePosition, roll: number): PiecePosition | null {
    switch (position.zone) {
      case 'yard':
        return roll === 6 ? { zone: 'track', square: START_SQUARES[seat] } : null;
      case 'finished':
        return null;
      case 'track': {
        const toEntry = (HOME_ENTRY_SQUARES[seat] - position.square + TRACK_LENGTH) % TRACK_LENGTH;
        if (roll <= toEntry) {
          return roll === toEntry
            ? { zone: 'home', step: 0 }
            : { zone: 'track', square: (position.square + roll) % TRACK_LENGTH };
        }
        return this.homeStep(roll - toEntry);
      }
      case 'home':
        return this.homeStep(position.step + roll);
    }
  }

  private homeStep(step: number): PiecePosition | null {
    if (step < HOME_PATH_LENGTH) {
      return { zone: 'home', step };
    }
    if (step === HOME_PATH_LENGTH || !this.exactRollToFinish) {
      return { zone: 'finished' };
    }
    return null;
  }

  private closeTurn(payload: LudoPayload): TurnDirective {
    const bonus = payload.bonusTurn;
    payload.pendingRoll = null;
    payload.bonusTurn = false;
    return bonus ? 'extra_turn' : 'next';
  }
}
