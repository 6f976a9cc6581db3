import { z } from 'zod';

/**
 * Core match types shared by the rule engines and the server orchestration.
 *
 * A stored match is two documents: the {@link MatchConfiguration} (who plays
 * what under which rules, and whose turn it is) and the {@link MatchState}
 * envelope carrying a game-kind-specific payload.
 */

export const GameKindSchema = z.enum(['tictactoe', 'checkers', 'ludo', 'soccer', 'clobber']);
export type GameKind = z.infer<typeof GameKindSchema>;

export const MatchResultSchema = z.enum([
  'in_progress',
  'player_win',
  'draw',
  'forfeit',
  'timeout',
  'player_left',
]);
export type MatchResult = z.infer<typeof MatchResultSchema>;

export const TimeoutKindSchema = z.enum(['none', 'per_turn', 'total_time']);
export type TimeoutKind = z.infer<typeof TimeoutKindSchema>;

/** `eliminate_player` currently behaves like `skip_turn`. */
export const TimeoutActionSchema = z.enum(['end_game', 'skip_turn', 'eliminate_player']);
export type TimeoutAction = z.infer<typeof TimeoutActionSchema>;

export type RuleValue = string | number | boolean;

/** User-supplied rule overrides; `null`/`undefined` fall back to the default. */
export type RuleOverrides = Record<string, RuleValue | null | undefined>;

/** Rule set after validation: every descriptor key present. */
export type ResolvedRules = Record<string, RuleValue>;

export const ResolvedRulesSchema = z.record(
  z.string(),
  z.union([z.string(), z.number(), z.boolean()])
);

export type RuleValueType = 'integer' | 'number' | 'boolean' | 'string';

export interface RuleOption {
  type: RuleValueType;
  default: RuleValue;
  allowedValues?: readonly RuleValue[];
  min?: number;
  max?: number;
  description: string;
}

/** Declarative per-kind rule options, keyed by rule name. */
export type RuleDescriptor = Readonly<Record<string, RuleOption>>;

export function isTerminalResult(result: MatchResult): boolean {
  return result !== 'in_progress';
}

// ---------------------------------------------------------------------------
// Timing
// ---------------------------------------------------------------------------

export interface TimingState {
  timeoutKind: TimeoutKind;
  timeoutSeconds: number;
  timeoutAction: TimeoutAction;
  /** ISO timestamp; non-null exactly while a turn window is open. */
  turnStartedAt: string | null;
  /** Remaining budget per participant, `total_time` only. */
  remainingSeconds?: Record<string, number>;
}

export const TimingStateSchema = z.object({
  timeoutKind: TimeoutKindSchema,
  timeoutSeconds: z.number().nonnegative(),
  timeoutAction: TimeoutActionSchema,
  turnStartedAt: z.string().datetime().nullable(),
  remainingSeconds: z.record(z.string(), z.number().nonnegative()).optional(),
});

// ---------------------------------------------------------------------------
// Configuration and state documents
// ---------------------------------------------------------------------------

export interface MatchConfiguration {
  matchId: string;
  gameKind: GameKind;
  participants: string[];
  ruleSet: ResolvedRules;
  currentTurnIndex: number;
}

export const MatchConfigurationSchema = z.object({
  matchId: z.string().min(1),
  gameKind: GameKindSchema,
  participants: z.array(z.string().min(1)).min(1),
  ruleSet: ResolvedRulesSchema,
  currentTurnIndex: z.number().int().nonnegative(),
});

export interface LastMove<TMove> {
  participantId: string;
  move: TMove;
  at: string;
}

/**
 * State envelope common to every game kind. `payload` holds the board,
 * pieces or graph of the concrete game and is tagged by `kind`.
 */
export interface MatchState<TKind extends GameKind = GameKind, TPayload = unknown, TMove = unknown> {
  kind: TKind;
  payload: TPayload;
  moveCount: number;
  lastMove: LastMove<TMove> | null;
  result: MatchResult;
  winnerIdentifier: string | null;
  currentTurnIdentifier: string;
  timing: TimingState;
  createdAt: string;
  forfeitedBy?: string;
  leftBy?: string;
}

/** Envelope schema; payload and last move are checked by the owning engine. */
export const MatchEnvelopeSchema = z.object({
  kind: GameKindSchema,
  payload: z.unknown(),
  moveCount: z.number().int().nonnegative(),
  lastMove: z
    .object({
      participantId: z.string(),
      move: z.unknown(),
      at: z.string(),
    })
    .nullable(),
  result: MatchResultSchema,
  winnerIdentifier: z.string().nullable(),
  currentTurnIdentifier: z.string(),
  timing: TimingStateSchema,
  createdAt: z.string(),
  forfeitedBy: z.string().optional(),
  leftBy: z.string().optional(),
});

// ---------------------------------------------------------------------------
// Engine outcomes
// ---------------------------------------------------------------------------

export interface GameOutcome {
  result: MatchResult;
  winnerIdentifier: string | null;
}

/**
 * What happens to the turn after a move is applied.
 * - `next`: close the turn window and rotate to the next participant
 * - `extra_turn`: close the window and open a fresh one for the same participant
 * - `continue`: the same turn goes on (e.g. dice rolled, piece still to move)
 */
export type TurnDirective = 'next' | 'extra_turn' | 'continue';

export interface TimeoutCheck {
  occurred: boolean;
  winnerIdentifier: string | null;
  timedOutIdentifier: string | null;
}

export interface TimingInfo {
  timeoutKind: TimeoutKind;
  timeoutSeconds: number;
  timeoutAction: TimeoutAction;
  currentIdentifier: string;
  remainingSeconds: number | null;
  perParticipantRemaining?: Record<string, number>;
}

/** Static catalogue entry for a game kind. */
export interface GameInfo {
  kind: GameKind;
  displayName: string;
  description: string;
  minPlayers: number;
  maxPlayers: number;
  category: string;
  turnBased: boolean;
  supportedRules: RuleDescriptor;
}
