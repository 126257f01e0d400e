import { logger } from '../utils/logger';
import type { GameService, ServiceResult } from '../services/GameServiceClient';
import type { MoveSearchEngine } from './ai/UciEngine';
import { isOurTurn, parseMoveList, reconstruct } from '../../shared/engine/positionTracker';
import {
  classifyChatMessage,
  decideDrawOffer,
  decideResignation,
  decideTakebackOffer,
  type PolicyConfig,
  type RandomSource,
} from '../../shared/engine/policy';
import {
  initialSessionState,
  markActive,
  markTerminated,
  withMoveCount,
  type ActiveSession,
  type GameSessionState,
  type TerminatedSession,
  type TerminationReason,
} from '../../shared/stateMachines/gameSession';
import { IN_PROGRESS_STATUS, type BoardState, type Color } from '../../shared/types/chess';
import { isFatalError, wrapError, type BotError } from '../../shared/errors';
import type {
  ChatLineEvent,
  GameFullEvent,
  GameStateEvent,
  GameStreamEvent,
} from '../../shared/validation/gameEventSchemas';

export interface GameSessionOptions {
  gameId: string;
  /** Our account id on the game service, compared against `white.id`. */
  accountId: string;
  gameService: GameService;
  engine: MoveSearchEngine;
  policy: PolicyConfig;
  /** Search budget handed to the engine for every move. */
  moveTimeMs: number;
  random?: RandomSource;
  sleep?: (ms: number) => Promise<void>;
}

export interface SessionOutcome {
  state: TerminatedSession;
  reason: TerminationReason;
  /** Set when the session ended on a failure. */
  error?: BotError;
}

function describePlayer(player: GameFullEvent['white']): string {
  if (player.aiLevel !== undefined) {
    return `AI level ${player.aiLevel}`;
  }
  return player.name ?? player.id ?? 'anonymous';
}

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

/**
 * GameSession plays a single game from its state stream:
 * - assigns our colour from the full-state event
 * - submits engine moves whenever the move list shows it is our turn
 * - answers draw and takeback proposals via the policy engine
 * - may resign in thin positions
 *
 * Any failure while processing the stream ends this session only.
 */
export class GameSession {
  public readonly gameId: string;
  private readonly accountId: string;
  private readonly gameService: GameService;
  private readonly engine: MoveSearchEngine;
  private readonly policy: PolicyConfig;
  private readonly moveTimeMs: number;
  private readonly random: RandomSource;
  private readonly sleep: (ms: number) => Promise<void>;

  private state: GameSessionState;
  // Move count of the position our last accepted move was played from.
  private answeredMoveCount: number | null = null;

  constructor(options: GameSessionOptions) {
    this.gameId = options.gameId;
    this.accountId = options.accountId;
    this.gameService = options.gameService;
    this.engine = options.engine;
    this.policy = options.policy;
    this.moveTimeMs = options.moveTimeMs;
    this.random = options.random ?? Math.random;
    this.sleep = options.sleep ?? defaultSleep;
    this.state = initialSessionState(options.gameId);
  }

  /**
   * Consume the game's state stream until the game ends, the stream closes or
   * processing fails.
   */
  public async run(): Promise<SessionOutcome> {
    logger.info('Game session started');
    try {
      await this.engine.newGame();
      for await (const event of this.gameService.streamGameState(this.gameId)) {
        await this.handleEvent(event);
        if (this.state.kind === 'terminated') {
          break;
        }
      }
      if (this.state.kind === 'terminated') {
        return { state: this.state, reason: this.state.reason };
      }
      return this.finish('stream_ended');
    } catch (error) {
      const botError = wrapError(error, { gameId: this.gameId });
      const meta = { error: botError.toJSON(), state: this.state.kind };
      if (isFatalError(botError)) {
        logger.error('Game session failed', meta);
      } else {
        logger.warn('Game session failed', meta);
      }
      return this.finish('error', botError);
    }
  }

  private async handleEvent(event: GameStreamEvent): Promise<void> {
    if (event.type === 'gameFull') {
      await this.onGameFull(event);
      return;
    }

    const session = this.state;
    if (session.kind !== 'active') {
      logger.warn('Ignoring event received before colour assignment', { type: event.type });
      return;
    }

    switch (event.type) {
      case 'gameState':
        await this.onGameState(session, event);
        return;
      case 'chatLine':
        await this.onChatLine(session, event);
        return;
      case 'takebackOffered':
        await this.respondToTakeback('offer');
        return;
      case 'unknown':
        logger.debug('Ignoring unrecognized game event', { type: event.rawType });
        return;
      default: {
        const exhaustive: never = event;
        throw new Error(`Unhandled game event: ${JSON.stringify(exhaustive)}`);
      }
    }
  }

  private async onGameFull(event: GameFullEvent): Promise<void> {
    const color: Color = event.white.id === this.accountId ? 'white' : 'black';
    const tokens = parseMoveList(event.state.moves);
    this.state = withMoveCount(markActive(this.state, color, tokens.length), tokens.length);

    const opponent = color === 'white' ? event.black : event.white;
    logger.info('Playing game', {
      color,
      opponent: describePlayer(opponent),
      moveCount: tokens.length,
    });

    if (event.state.status !== IN_PROGRESS_STATUS) {
      this.terminate('game_over', event.state.status);
      return;
    }

    const session = this.state;
    if (session.kind === 'active' && isOurTurn(tokens, session.color)) {
      await this.submitMove(reconstruct(tokens));
    }
  }

  private async onGameState(session: ActiveSession, event: GameStateEvent): Promise<void> {
    if (event.status !== IN_PROGRESS_STATUS) {
      this.terminate('game_over', event.status);
      return;
    }

    const tokens = parseMoveList(event.moves);
    this.state = withMoveCount(session, tokens.length);

    // Repeated state (e.g. a draw offer) for a position we already moved from.
    if (tokens.length === this.answeredMoveCount) {
      logger.debug('Move already played for this position', { moveCount: tokens.length });
      return;
    }
    this.answeredMoveCount = null;

    if (!isOurTurn(tokens, session.color)) {
      logger.debug('Waiting for opponent', { moveCount: tokens.length });
      return;
    }

    await this.sleep(this.policy.moveDelayMs);
    const board = reconstruct(tokens);

    if (decideResignation(board, this.policy, this.random) === 'resign') {
      const result = await this.gameService.resign(this.gameId);
      if (result.ok) {
        logger.info('Resigned', { moveCount: tokens.length, pieceCount: board.pieceCount });
        this.terminate('resigned');
        return;
      }
      logger.warn('Resignation failed; playing on', { error: result.error.message });
    }

    await this.submitMove(board);
  }

  private async onChatLine(session: ActiveSession, event: ChatLineEvent): Promise<void> {
    logger.info('Chat', { from: event.username, text: event.text });
    const proposal = classifyChatMessage(event.text, this.policy);
    if (proposal === null) {
      return;
    }

    if (proposal === 'takeback') {
      await this.respondToTakeback('chat');
      return;
    }

    const decision = decideDrawOffer(session.moveCount, this.policy, this.random);
    logger.info('Draw proposed', {
      from: event.username,
      moveCount: session.moveCount,
      decision,
    });
    if (decision === 'accept') {
      this.logActionResult(
        await this.gameService.acceptDraw(this.gameId),
        'Draw accepted',
        'Draw acceptance failed'
      );
    }
  }

  private async respondToTakeback(source: 'chat' | 'offer'): Promise<void> {
    const decision = decideTakebackOffer(this.policy, this.random);
    logger.info('Takeback proposed', { source, decision });
    if (decision === 'accept') {
      this.logActionResult(
        await this.gameService.acceptTakeback(this.gameId),
        'Takeback accepted',
        'Takeback acceptance failed'
      );
    }
  }

  private async submitMove(board: BoardState): Promise<void> {
    const move = await this.engine.play(board, this.moveTimeMs);
    const ply = board.moves.length + 1;
    const result = await this.gameService.makeMove(this.gameId, move);
    if (result.ok) {
      this.answeredMoveCount = board.moves.length;
    }
    this.logActionResult(result, 'Move submitted', 'Move submission failed', { move, ply });
  }

  private logActionResult(
    result: ServiceResult,
    success: string,
    failure: string,
    meta: Record<string, unknown> = {}
  ): void {
    if (result.ok) {
      logger.info(success, meta);
      return;
    }
    // The client already logged the transport details; the session carries on.
    logger.warn(failure, { ...meta, error: result.error.message });
  }

  private terminate(reason: TerminationReason, status?: string): void {
    this.state = markTerminated(this.state, reason, status);
    logger.info('Game over', { reason, ...(status !== undefined && { status }) });
  }

  private finish(reason: TerminationReason, error?: BotError): SessionOutcome {
    const state = markTerminated(this.state, reason);
    this.state = state;
    if (reason !== 'error') {
      logger.info('Game session ended', { reason });
    }
    return { state, reason, ...(error !== undefined && { error }) };
  }
}
