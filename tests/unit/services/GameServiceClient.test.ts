import axios, { type AxiosInstance } from 'axios';
import { Readable } from 'stream';
import {
  GameServiceClient,
  describeServiceError,
} from '../../../src/server/services/GameServiceClient';
import { ExternalServiceError } from '../../../src/shared/errors';
import { logger } from '../../../src/server/utils/logger';

jest.mock('axios');
jest.mock('../../../src/server/utils/logger', () => ({
  logger: {
    error: jest.fn(),
    warn: jest.fn(),
    info: jest.fn(),
    debug: jest.fn(),
  },
}));

interface HttpMocks {
  get: jest.Mock;
  post: jest.Mock;
}

describe('GameServiceClient', () => {
  const createHttpMocks = (): HttpMocks => {
    const mocks = { get: jest.fn(), post: jest.fn() };
    jest.mocked(axios.create).mockReturnValue(mocks as unknown as AxiosInstance);
    return mocks;
  };

  const createClient = () =>
    new GameServiceClient({
      baseURL: 'https://lichess.test',
      token: 'test-token',
      requestTimeoutMs: 5000,
    });

  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('configures a bearer-authenticated HTTP client', () => {
    createHttpMocks();
    createClient();

    expect(axios.create).toHaveBeenCalledWith({
      baseURL: 'https://lichess.test',
      timeout: 5000,
      headers: {
        Authorization: 'Bearer test-token',
        Accept: 'application/json',
      },
    });
  });

  it('falls back to the loaded configuration', () => {
    createHttpMocks();
    new GameServiceClient();

    expect(axios.create).toHaveBeenCalledWith({
      baseURL: 'https://lichess.org',
      timeout: 10000,
      headers: {
        Authorization: 'Bearer test-token',
        Accept: 'application/json',
      },
    });
  });

  describe('actions', () => {
    it.each([
      ['acceptChallenge', (c: GameServiceClient) => c.acceptChallenge('ch-1'), '/api/challenge/ch-1/accept'],
      ['makeMove', (c: GameServiceClient) => c.makeMove('g1', 'e7e8q'), '/api/board/game/g1/move/e7e8q'],
      ['acceptDraw', (c: GameServiceClient) => c.acceptDraw('g1'), '/api/board/game/g1/draw/yes'],
      ['acceptTakeback', (c: GameServiceClient) => c.acceptTakeback('g1'), '/api/board/game/g1/takeback/yes'],
      ['resign', (c: GameServiceClient) => c.resign('g1'), '/api/board/game/g1/resign'],
    ])('%s posts to the matching endpoint', async (_name, call, url) => {
      const http = createHttpMocks();
      http.post.mockResolvedValue({ data: { ok: true } });

      const result = await call(createClient());

      expect(http.post).toHaveBeenCalledTimes(1);
      expect(http.post).toHaveBeenCalledWith(url);
      expect(result).toEqual({ ok: true, value: undefined });
    });

    it('returns a failure result instead of throwing and logs the response', async () => {
      const http = createHttpMocks();
      http.post.mockRejectedValue({
        message: 'Request failed with status code 400',
        response: { status: 400, data: { error: 'Not your turn' } },
      });

      const result = await createClient().makeMove('g1', 'e2e4');

      expect(result.ok).toBe(false);
      if (result.ok) {
        return;
      }
      expect(result.error).toBeInstanceOf(ExternalServiceError);
      expect(result.error.operation).toBe('makeMove');
      expect(result.error.category).toBe('client_error');
      expect(result.error.status).toBe(400);
      expect(result.error.message).toBe(
        'Game service makeMove failed: Request failed with status code 400'
      );
      expect(logger.error).toHaveBeenCalledTimes(1);
      expect(logger.error).toHaveBeenCalledWith('Game service request failed', {
        operation: 'makeMove',
        type: 'client_error',
        status: 400,
        message: 'Request failed with status code 400',
        response: { error: 'Not your turn' },
        move: 'e2e4',
      });
    });
  });

  describe('getAccount', () => {
    it('returns the validated profile', async () => {
      const http = createHttpMocks();
      http.get.mockResolvedValue({ data: { id: 'relaybot', username: 'RelayBot', title: 'BOT' } });

      await expect(createClient().getAccount()).resolves.toEqual({
        id: 'relaybot',
        username: 'RelayBot',
      });
      expect(http.get).toHaveBeenCalledWith('/api/account');
    });

    it('throws a service error when the request fails', async () => {
      const http = createHttpMocks();
      http.get.mockRejectedValue({ message: 'Unauthorized', response: { status: 401, data: {} } });

      await expect(createClient().getAccount()).rejects.toBeInstanceOf(ExternalServiceError);
    });
  });

  describe('streams', () => {
    it('decodes the game state stream', async () => {
      const http = createHttpMocks();
      http.get.mockResolvedValue({
        data: Readable.from([
          '{"type":"gameState","moves":"e2e4","status":"started"}\n',
          '\n',
          '{"type":"chatLine","room":"player","username":"opp","text":"hi"}\n',
        ]),
      });

      const events = [];
      for await (const event of createClient().streamGameState('g1')) {
        events.push(event);
      }

      expect(http.get).toHaveBeenCalledWith('/api/board/game/stream/g1', {
        responseType: 'stream',
        timeout: 0,
        headers: { Accept: 'application/x-ndjson' },
      });
      expect(events).toEqual([
        { type: 'gameState', moves: 'e2e4', status: 'started' },
        { type: 'chatLine', room: 'player', username: 'opp', text: 'hi' },
      ]);
    });

    it('decodes the incoming event stream', async () => {
      const http = createHttpMocks();
      http.get.mockResolvedValue({
        data: Readable.from(['{"type":"gameStart","game":{"gameId":"g1"}}\n']),
      });

      const events = [];
      for await (const event of createClient().streamIncomingEvents()) {
        events.push(event);
      }

      expect(http.get).toHaveBeenCalledWith('/api/stream/event', expect.any(Object));
      expect(events).toEqual([{ type: 'gameStart', gameId: 'g1' }]);
    });

    it('throws when a stream cannot be opened and leaves the body out of the log', async () => {
      const http = createHttpMocks();
      http.get.mockRejectedValue({
        message: 'Bad gateway',
        response: { status: 502, data: Readable.from([]) },
      });

      const iterator = createClient().streamGameState('g1')[Symbol.asyncIterator]();
      await expect(iterator.next()).rejects.toBeInstanceOf(ExternalServiceError);
      expect(logger.error).toHaveBeenCalledWith('Game service request failed', {
        operation: 'streamGameState',
        type: 'server_error',
        status: 502,
        message: 'Bad gateway',
      });
    });
  });
});

describe('describeServiceError', () => {
  it('categorizes transport failures by code', () => {
    expect(describeServiceError({ code: 'ECONNREFUSED', message: 'refused' }).category).toBe(
      'connection_refused'
    );
    expect(describeServiceError({ code: 'ECONNABORTED', message: 'aborted' }).category).toBe(
      'timeout'
    );
    expect(describeServiceError({ code: 'ETIMEDOUT', message: 'slow' }).category).toBe('timeout');
  });

  it('categorizes HTTP failures by status', () => {
    expect(describeServiceError({ response: { status: 503 } }).category).toBe('server_error');
    expect(describeServiceError({ response: { status: 429 } }).category).toBe('client_error');
  });

  it('falls back to unknown for anything else', () => {
    expect(describeServiceError(new Error('boom'))).toEqual({
      category: 'unknown',
      status: undefined,
      message: 'boom',
      responseData: undefined,
    });
    expect(describeServiceError('plain failure').message).toBe('plain failure');
  });
});
