import { ConfigurationError, MatchErrorCode } from '../errors/MatchDomainErrors';
import { GameKindSchema, type GameInfo, type GameKind } from '../types/match';
import type { EngineConfiguration, EngineContext, MatchEngine } from './GameEngine';
import { CHECKERS_INFO, CheckersEngine } from './games/CheckersEngine';
import { CLOBBER_INFO, ClobberEngine } from './games/ClobberEngine';
import { LUDO_INFO, LudoEngine } from './games/LudoEngine';
import { SOCCER_INFO, SoccerEngine } from './games/SoccerEngine';
import { TICTACTOE_INFO, TicTacToeEngine } from './games/TicTacToeEngine';

interface EngineRegistration {
  info: GameInfo;
  create(configuration: EngineConfiguration, context?: EngineContext): MatchEngine;
}

const REGISTRY: Readonly<Record<GameKind, EngineRegistration>> = {
  tictactoe: {
    info: TICTACTOE_INFO,
    create: (configuration, context) => new TicTacToeEngine(configuration, context),
  },
  checkers: {
    info: CHECKERS_INFO,
    create: (configuration, context) => new CheckersEngine(configuration, context),
  },
  ludo: {
    info: LUDO_INFO,
    create: (configuration, context) => new LudoEngine(configuration, context),
  },
  soccer: {
    info: SOCCER_INFO,
    create: (configuration, context) => new SoccerEngine(configuration, context),
  },
  clobber: {
    info: CLOBBER_INFO,
    create: (configuration, context) => new ClobberEngine(configuration, context),
  },
};

export function isGameKind(value: string): value is GameKind {
  return GameKindSchema.safeParse(value).success;
}

function registrationFor(kind: string): EngineRegistration {
  if (!isGameKind(kind)) {
    throw new ConfigurationError(
      `Unknown game kind '${kind}'`,
      { kind, supported: GameKindSchema.options },
      MatchErrorCode.CONFIGURATION_UNKNOWN_KIND
    );
  }
  return REGISTRY[kind];
}

/**
 * Build an engine for a stored or requested match. Throws ConfigurationError
 * for an unknown kind, bad arity or invalid rules.
 */
export function createEngine(
  kind: string,
  configuration: EngineConfiguration,
  context?: EngineContext
): MatchEngine {
  return registrationFor(kind).create(configuration, context);
}

export function getGameInfo(kind: string): GameInfo {
  return registrationFor(kind).info;
}

export function listGames(): GameInfo[] {
  return GameKindSchema.options.map((kind) => REGISTRY[kind].info);
}
