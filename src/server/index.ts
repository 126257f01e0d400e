import { config } from './config';
import { logger } from './utils/logger';
import { GameServiceClient } from './services/GameServiceClient';
import { GameSessionManager } from './game/GameSessionManager';
import { UciEngine, withEngine, type MoveSearchEngine } from './game/ai/UciEngine';

const SHUTDOWN_TIMEOUT_MS = 5000;

let activeEngine: MoveSearchEngine | null = null;

async function startBot(): Promise<void> {
  try {
    const gameService = new GameServiceClient();
    const account = await gameService.getAccount();

    logger.info(`Bot ${account.username} started`, {
      version: config.app.version,
      environment: config.nodeEnv,
      gameServiceUrl: config.gameService.url,
    });
    logger.info('Behaviour settings', {
      drawAcceptChance: config.policy.drawAcceptChance,
      takebackAcceptChance: config.policy.takebackAcceptChance,
      resignChance: config.policy.resignChance,
      minMovesForDraw: config.policy.minMovesForDraw,
      moveDelayMs: config.policy.moveDelayMs,
      moveTimeMs: config.engine.moveTimeMs,
    });

    // Graceful shutdown
    process.on('SIGTERM', gracefulShutdown);
    process.on('SIGINT', gracefulShutdown);

    await withEngine(
      () =>
        UciEngine.start({
          path: config.engine.path,
          startupTimeoutMs: config.engine.startupTimeoutMs,
        }),
      async (engine) => {
        activeEngine = engine;
        const manager = new GameSessionManager({
          account,
          gameService,
          engine,
          policy: config.policy,
          moveTimeMs: config.engine.moveTimeMs,
        });
        await manager.listen();
      }
    );
    activeEngine = null;
    logger.info('Bot stopped');
  } catch (error) {
    logger.error('Bot failed', {
      error: error instanceof Error ? error.message : String(error),
    });
    process.exit(1);
  }
}

function gracefulShutdown(signal: string) {
  logger.info(`Received ${signal}. Shutting down...`);

  // Force exit if the engine does not go away in time.
  setTimeout(() => {
    logger.error('Engine did not stop in time, forcefully shutting down');
    process.exit(1);
  }, SHUTDOWN_TIMEOUT_MS).unref();

  const engine = activeEngine;
  activeEngine = null;
  if (!engine) {
    process.exit(0);
  }
  void engine.quit().then(
    () => process.exit(0),
    (error: unknown) => {
      logger.error('Engine shutdown failed', {
        error: error instanceof Error ? error.message : String(error),
      });
      process.exit(1);
    }
  );
}

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled Rejection', {
    reason: reason instanceof Error ? reason.message : String(reason),
  });
  process.exit(1);
});

void startBot();
