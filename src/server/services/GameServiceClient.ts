/**
 * Client for the remote game service (Lichess Board API).
 * Opens the two NDJSON event streams and submits the bot's actions.
 *
 * Action calls never throw: failures are logged here and handed back as an
 * ExternalServiceError result for the session controller to inspect.
 */

import axios, { AxiosInstance } from 'axios';
import type { Readable } from 'stream';
import { z } from 'zod';
import { config } from '../config';
import { logger } from '../utils/logger';
import { readNdjson } from './ndjson';
import { ExternalServiceError, type ServiceErrorCategory } from '../../shared/errors';
import { err, ok, type Result } from '../../shared/utils/result';
import {
  parseGameStreamEvent,
  parseIncomingEvent,
  type GameStreamEvent,
  type IncomingEvent,
} from '../../shared/validation/gameEventSchemas';
import type { MoveToken } from '../../shared/types/chess';

export type ServiceResult = Result<void, ExternalServiceError>;

export interface GameServiceAccount {
  id: string;
  username: string;
}

/**
 * Operations the bot needs from the game service. The session controller and
 * the session manager depend on this interface only.
 */
export interface GameService {
  getAccount(): Promise<GameServiceAccount>;
  acceptChallenge(challengeId: string): Promise<ServiceResult>;
  streamIncomingEvents(): AsyncIterable<IncomingEvent>;
  streamGameState(gameId: string): AsyncIterable<GameStreamEvent>;
  makeMove(gameId: string, move: MoveToken): Promise<ServiceResult>;
  acceptDraw(gameId: string): Promise<ServiceResult>;
  acceptTakeback(gameId: string): Promise<ServiceResult>;
  resign(gameId: string): Promise<ServiceResult>;
}

export interface GameServiceClientOptions {
  baseURL?: string;
  token?: string;
  requestTimeoutMs?: number;
}

const AccountSchema = z.object({
  id: z.string().min(1),
  username: z.string().min(1),
});

interface DescribedServiceError {
  category: ServiceErrorCategory;
  status: number | undefined;
  message: string;
  responseData: unknown;
}

/**
 * Categorize a transport failure for diagnostics.
 */
export function describeServiceError(error: unknown): DescribedServiceError {
  const described: DescribedServiceError = {
    category: 'unknown',
    status: undefined,
    message: error instanceof Error ? error.message : String(error),
    responseData: undefined,
  };
  if (typeof error !== 'object' || error === null) {
    return described;
  }

  if ('message' in error && typeof error.message === 'string') {
    described.message = error.message;
  }
  if ('response' in error && typeof error.response === 'object' && error.response !== null) {
    const response = error.response;
    if ('status' in response && typeof response.status === 'number') {
      described.status = response.status;
    }
    if ('data' in response) {
      described.responseData = response.data;
    }
  }

  const code = 'code' in error ? error.code : undefined;
  const status = described.status;
  if (code === 'ECONNREFUSED') {
    described.category = 'connection_refused';
  } else if (code === 'ETIMEDOUT' || code === 'ECONNABORTED') {
    described.category = 'timeout';
  } else if (status !== undefined && status >= 500) {
    described.category = 'server_error';
  } else if (status !== undefined && status >= 400) {
    described.category = 'client_error';
  }
  return described;
}

export class GameServiceClient implements GameService {
  private readonly client: AxiosInstance;

  constructor(options: GameServiceClientOptions = {}) {
    this.client = axios.create({
      baseURL: options.baseURL ?? config.gameService.url,
      // Bounded per-request timeout for action calls. The event streams
      // override it because they stay open for the lifetime of a game.
      timeout: options.requestTimeoutMs ?? config.gameService.requestTimeoutMs,
      headers: {
        Authorization: `Bearer ${options.token ?? config.gameService.token}`,
        Accept: 'application/json',
      },
    });
  }

  async getAccount(): Promise<GameServiceAccount> {
    try {
      const response = await this.client.get<unknown>('/api/account');
      return AccountSchema.parse(response.data);
    } catch (error) {
      throw this.toServiceError('getAccount', error);
    }
  }

  acceptChallenge(challengeId: string): Promise<ServiceResult> {
    return this.postAction('acceptChallenge', `/api/challenge/${encodeURIComponent(challengeId)}/accept`);
  }

  makeMove(gameId: string, move: MoveToken): Promise<ServiceResult> {
    return this.postAction(
      'makeMove',
      `${this.gamePath(gameId)}/move/${encodeURIComponent(move)}`,
      { move }
    );
  }

  acceptDraw(gameId: string): Promise<ServiceResult> {
    return this.postAction('acceptDraw', `${this.gamePath(gameId)}/draw/yes`);
  }

  acceptTakeback(gameId: string): Promise<ServiceResult> {
    return this.postAction('acceptTakeback', `${this.gamePath(gameId)}/takeback/yes`);
  }

  resign(gameId: string): Promise<ServiceResult> {
    return this.postAction('resign', `${this.gamePath(gameId)}/resign`);
  }

  async *streamIncomingEvents(): AsyncGenerator<IncomingEvent, void, undefined> {
    const stream = await this.openStream('streamIncomingEvents', '/api/stream/event');
    try {
      for await (const raw of readNdjson(stream)) {
        yield parseIncomingEvent(raw);
      }
    } finally {
      stream.destroy();
    }
  }

  async *streamGameState(gameId: string): AsyncGenerator<GameStreamEvent, void, undefined> {
    const stream = await this.openStream(
      'streamGameState',
      `/api/board/game/stream/${encodeURIComponent(gameId)}`
    );
    try {
      for await (const raw of readNdjson(stream)) {
        yield parseGameStreamEvent(raw);
      }
    } finally {
      // A session can stop reading before the service closes the stream
      // (terminal status, resignation, error); release the socket.
      stream.destroy();
    }
  }

  private gamePath(gameId: string): string {
    return `/api/board/game/${encodeURIComponent(gameId)}`;
  }

  private async openStream(operation: string, url: string): Promise<Readable> {
    try {
      const response = await this.client.get<Readable>(url, {
        responseType: 'stream',
        timeout: 0,
        headers: { Accept: 'application/x-ndjson' },
      });
      return response.data;
    } catch (error) {
      // The error body of a stream request is itself a stream; leave it out.
      throw this.toServiceError(operation, error, {}, false);
    }
  }

  private async postAction(
    operation: string,
    url: string,
    context: Record<string, unknown> = {}
  ): Promise<ServiceResult> {
    try {
      await this.client.post(url);
      return ok(undefined);
    } catch (error) {
      return err(this.toServiceError(operation, error, context));
    }
  }

  private toServiceError(
    operation: string,
    error: unknown,
    context: Record<string, unknown> = {},
    includeResponse = true
  ): ExternalServiceError {
    const described = describeServiceError(error);
    logger.error('Game service request failed', {
      operation,
      type: described.category,
      status: described.status,
      message: described.message,
      ...(includeResponse && { response: described.responseData }),
      ...context,
    });
    return new ExternalServiceError(
      operation,
      described.message,
      described.category,
      described.status,
      context
    );
  }
}
