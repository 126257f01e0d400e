import { GameSessionManager } from '../../src/server/game/GameSessionManager';
import type { GameService, ServiceResult } from '../../src/server/services/GameServiceClient';
import type { MoveSearchEngine } from '../../src/server/game/ai/UciEngine';
import type { PolicyConfig } from '../../src/shared/engine/policy';
import type {
  GameStreamEvent,
  IncomingEvent,
} from '../../src/shared/validation/gameEventSchemas';
import { EngineUnavailableError, ExternalServiceError } from '../../src/shared/errors';
import { err } from '../../src/shared/utils/result';
import { logger, runWithSessionContext } from '../../src/server/utils/logger';

jest.mock('../../src/server/utils/logger', () => ({
  logger: {
    error: jest.fn(),
    warn: jest.fn(),
    info: jest.fn(),
    debug: jest.fn(),
  },
  runWithSessionContext: jest.fn((_context: unknown, fn: () => unknown) => fn()),
}));

const okResult: ServiceResult = { ok: true, value: undefined };

const policy: PolicyConfig = {
  drawAcceptChance: 0,
  takebackAcceptChance: 0,
  resignChance: 0,
  minMovesForDraw: 10,
  moveDelayMs: 0,
  drawKeywords: ['draw'],
  takebackKeywords: ['takeback'],
};

async function* fromArray<T>(items: T[]): AsyncGenerator<T> {
  for (const item of items) {
    yield item;
  }
}

function createGameService(
  incoming: IncomingEvent[],
  games: Record<string, GameStreamEvent[] | Error>
): jest.Mocked<GameService> {
  return {
    getAccount: jest.fn(),
    acceptChallenge: jest.fn().mockResolvedValue(okResult),
    streamIncomingEvents: jest.fn(() => fromArray(incoming)),
    streamGameState: jest.fn((gameId: string) => {
      const game = games[gameId];
      if (game instanceof Error) {
        return (async function* (): AsyncGenerator<GameStreamEvent> {
          throw game;
        })();
      }
      return fromArray(game ?? []);
    }),
    makeMove: jest.fn().mockResolvedValue(okResult),
    acceptDraw: jest.fn().mockResolvedValue(okResult),
    acceptTakeback: jest.fn().mockResolvedValue(okResult),
    resign: jest.fn().mockResolvedValue(okResult),
  };
}

function createEngine(): jest.Mocked<MoveSearchEngine> {
  return {
    newGame: jest.fn().mockResolvedValue(undefined),
    play: jest.fn().mockResolvedValue('e2e4'),
    quit: jest.fn().mockResolvedValue(undefined),
    isRunning: jest.fn().mockReturnValue(true),
  };
}

const finishedGame = (gameId: string): GameStreamEvent[] => [
  {
    type: 'gameFull',
    id: gameId,
    white: { id: 'opponent' },
    black: { id: 'relaybot' },
    state: { moves: '', status: 'started' },
  },
  { type: 'gameState', moves: 'f2f3 e7e5 g2g4 d8h4', status: 'mate', winner: 'black' },
];

const createManager = (gameService: GameService, engine: MoveSearchEngine = createEngine()) =>
  new GameSessionManager({
    account: { id: 'relaybot', username: 'RelayBot' },
    gameService,
    engine,
    policy,
    moveTimeMs: 100,
  });

describe('GameSessionManager', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('accepts every challenge', async () => {
    const service = createGameService(
      [
        { type: 'challenge', challenge: { id: 'ch-1', challenger: { name: 'Alice' } } },
        { type: 'challenge', challenge: { id: 'ch-2' } },
      ],
      {}
    );

    await createManager(service).listen();

    expect(service.acceptChallenge.mock.calls).toEqual([['ch-1'], ['ch-2']]);
    expect(logger.info).toHaveBeenCalledWith('Challenge accepted', {
      challengeId: 'ch-1',
      challenger: 'Alice',
    });
  });

  it('keeps listening when a challenge cannot be accepted', async () => {
    const service = createGameService(
      [
        { type: 'challenge', challenge: { id: 'ch-1' } },
        { type: 'gameStart', gameId: 'g1' },
      ],
      { g1: finishedGame('g1') }
    );
    service.acceptChallenge.mockResolvedValue(
      err(new ExternalServiceError('acceptChallenge', 'gone', 'client_error', 404))
    );

    const manager = createManager(service);
    await manager.listen();

    expect(logger.warn).toHaveBeenCalledWith('Could not accept challenge', {
      challengeId: 'ch-1',
      error: 'Game service acceptChallenge failed: gone',
    });
    expect(manager.getGamesPlayed()).toBe(1);
  });

  it('plays games one after another inside a session context', async () => {
    const service = createGameService(
      [
        { type: 'gameStart', gameId: 'g1' },
        { type: 'unknown', rawType: 'gameFinish' },
        { type: 'gameStart', gameId: 'g2' },
      ],
      { g1: finishedGame('g1'), g2: finishedGame('g2') }
    );

    const manager = createManager(service);
    await manager.listen();

    expect(service.streamGameState.mock.calls).toEqual([['g1'], ['g2']]);
    expect(jest.mocked(runWithSessionContext).mock.calls.map(([context]) => context)).toEqual([
      { gameId: 'g1' },
      { gameId: 'g2' },
    ]);
    expect(manager.getGamesPlayed()).toBe(2);
    expect(logger.info).toHaveBeenCalledWith('Session finished', {
      reason: 'game_over',
      moveCount: 0,
      status: 'mate',
    });
  });

  it('survives a failing session and plays the next game', async () => {
    const service = createGameService(
      [
        { type: 'gameStart', gameId: 'broken' },
        { type: 'gameStart', gameId: 'g2' },
      ],
      {
        broken: new ExternalServiceError('streamGameState', 'socket hang up', 'unknown'),
        g2: finishedGame('g2'),
      }
    );

    const manager = createManager(service);
    await manager.listen();

    expect(logger.info).toHaveBeenCalledWith('Session finished', {
      reason: 'error',
      moveCount: 0,
    });
    expect(service.streamGameState).toHaveBeenCalledWith('g2');
    expect(manager.getGamesPlayed()).toBe(2);
  });

  it('stops listening once the engine has exited', async () => {
    const service = createGameService(
      [
        { type: 'gameStart', gameId: 'g1' },
        { type: 'challenge', challenge: { id: 'ch-1' } },
        { type: 'gameStart', gameId: 'g2' },
      ],
      { g1: finishedGame('g1'), g2: finishedGame('g2') }
    );
    const engine = createEngine();
    const exited = new EngineUnavailableError('engine process exited');
    engine.newGame.mockRejectedValue(exited);
    engine.isRunning.mockReturnValue(false);

    const manager = createManager(service, engine);

    await expect(manager.listen()).rejects.toBe(exited);
    expect(service.acceptChallenge).not.toHaveBeenCalled();
    expect(service.streamGameState).not.toHaveBeenCalled();
    expect(manager.getGamesPlayed()).toBe(1);
  });

  it('returns the outcome of a single game', async () => {
    const service = createGameService([], { g1: finishedGame('g1') });

    const outcome = await createManager(service).playGame('g1');

    expect(outcome.reason).toBe('game_over');
    expect(outcome.state.color).toBe('black');
  });
});
