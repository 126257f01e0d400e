import { GameSession, type SessionOutcome } from './GameSession';
import type { MoveSearchEngine } from './ai/UciEngine';
import type { GameService, GameServiceAccount } from '../services/GameServiceClient';
import { logger, runWithSessionContext } from '../utils/logger';
import type { PolicyConfig } from '../../shared/engine/policy';
import type { ChallengeEvent } from '../../shared/validation/gameEventSchemas';
import { EngineUnavailableError } from '../../shared/errors';

export interface GameSessionManagerOptions {
  account: GameServiceAccount;
  gameService: GameService;
  engine: MoveSearchEngine;
  policy: PolicyConfig;
  moveTimeMs: number;
}

/**
 * Outer listening loop. Accepts every challenge and plays the games the
 * service starts, one at a time: the next incoming event is not read until
 * the current session has ended.
 */
export class GameSessionManager {
  private readonly options: GameSessionManagerOptions;
  private gamesPlayed = 0;

  constructor(options: GameSessionManagerOptions) {
    this.options = options;
  }

  public getGamesPlayed(): number {
    return this.gamesPlayed;
  }

  /**
   * Read the account's incoming-event stream until the service closes it.
   * Rejects once the engine has stopped running.
   */
  public async listen(): Promise<void> {
    logger.info('Listening for challenges', { account: this.options.account.username });

    for await (const event of this.options.gameService.streamIncomingEvents()) {
      switch (event.type) {
        case 'challenge':
          await this.acceptChallenge(event);
          break;
        case 'gameStart': {
          const outcome = await this.playGame(event.gameId);
          if (!this.options.engine.isRunning()) {
            // No later game could be played; let the caller shut down.
            throw outcome.error ?? new EngineUnavailableError('engine process exited');
          }
          break;
        }
        case 'unknown':
          logger.debug('Ignoring incoming event', { type: event.rawType });
          break;
        default: {
          const exhaustive: never = event;
          throw new Error(`Unhandled incoming event: ${JSON.stringify(exhaustive)}`);
        }
      }
    }

    logger.warn('Incoming event stream closed', { gamesPlayed: this.gamesPlayed });
  }

  /**
   * Play one game to completion. Never throws: session failures are folded
   * into the returned outcome so the listener keeps going.
   */
  public playGame(gameId: string): Promise<SessionOutcome> {
    return runWithSessionContext({ gameId }, async () => {
      const session = new GameSession({
        gameId,
        accountId: this.options.account.id,
        gameService: this.options.gameService,
        engine: this.options.engine,
        policy: this.options.policy,
        moveTimeMs: this.options.moveTimeMs,
      });

      const outcome = await session.run();
      this.gamesPlayed += 1;
      logger.info('Session finished', {
        reason: outcome.reason,
        moveCount: outcome.state.moveCount,
        ...(outcome.state.status !== undefined && { status: outcome.state.status }),
      });
      return outcome;
    });
  }

  private async acceptChallenge(event: ChallengeEvent): Promise<void> {
    const { id, challenger } = event.challenge;
    const result = await this.options.gameService.acceptChallenge(id);
    if (result.ok) {
      logger.info('Challenge accepted', {
        challengeId: id,
        challenger: challenger?.name ?? challenger?.id ?? 'unknown',
      });
    } else {
      logger.warn('Could not accept challenge', { challengeId: id, error: result.error.message });
    }
  }
}
