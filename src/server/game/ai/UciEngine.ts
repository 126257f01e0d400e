/**
 * Adapter for an external UCI move-search engine (Stockfish or any other
 * engine speaking the Universal Chess Interface over stdin/stdout).
 *
 * The engine is a black box: positions go in as `position startpos moves ...`
 * and a single `bestmove` comes back. Searches on one engine are serialized.
 */

import { spawn, type ChildProcessWithoutNullStreams } from 'child_process';
import readline from 'readline';
import { EngineUnavailableError } from '../../../shared/errors';
import { runWithTimeout } from '../../../shared/utils/timeout';
import type { BoardState, MoveToken } from '../../../shared/types/chess';
import { logger } from '../../utils/logger';

/**
 * Move-search collaborator consumed by the session controller.
 */
export interface MoveSearchEngine {
  /** Reset engine state between games. */
  newGame(): Promise<void>;
  /** Search `board` for `timeLimitMs` and return the chosen move. */
  play(board: BoardState, timeLimitMs: number): Promise<MoveToken>;
  /** Terminate the engine process. Safe to call more than once. */
  quit(): Promise<void>;
  /** False once the process has exited or failed to spawn. */
  isRunning(): boolean;
}

export interface UciEngineOptions {
  /** Executable to spawn. */
  path: string;
  args?: string[];
  /** Upper bound for each handshake step (`uciok`, `readyok`). */
  startupTimeoutMs: number;
  /** Extra time allowed past the search budget before giving up. */
  responseGraceMs?: number;
  /** Wait for a clean exit after `quit` before killing. */
  quitTimeoutMs?: number;
}

export const ENGINE_RESPONSE_GRACE_MS = 5000;
const DEFAULT_QUIT_TIMEOUT_MS = 1000;

interface LineWaiter {
  matches: (line: string) => boolean;
  resolve: (line: string) => void;
  reject: (error: Error) => void;
}

export class UciEngine implements MoveSearchEngine {
  private readonly child: ChildProcessWithoutNullStreams;
  private readonly options: UciEngineOptions;
  private waiter: LineWaiter | null = null;
  private exitError: EngineUnavailableError | null = null;
  // Replies still owed by searches that were abandoned on timeout.
  private staleBestmoves = 0;
  private readonly exited: Promise<void>;
  // Tail of the serialized command queue.
  private queue: Promise<unknown> = Promise.resolve();

  private constructor(child: ChildProcessWithoutNullStreams, options: UciEngineOptions) {
    this.child = child;
    this.options = options;

    this.exited = new Promise<void>((resolve) => {
      child.once('exit', (code, signal) => {
        this.fail(new EngineUnavailableError('engine process exited', { code, signal }));
        resolve();
      });
    });
    child.on('error', (error) => {
      this.fail(new EngineUnavailableError(error.message, { path: options.path }));
    });
    child.stdin.on('error', (error) => {
      logger.warn('Engine stdin error', { error: error.message });
    });

    readline.createInterface({ input: child.stdout }).on('line', (line) => this.onLine(line));
    readline.createInterface({ input: child.stderr }).on('line', (line) => {
      logger.debug('Engine stderr', { line });
    });
  }

  /**
   * Spawn the engine and complete the UCI handshake.
   */
  static async start(options: UciEngineOptions): Promise<UciEngine> {
    const child = spawn(options.path, options.args ?? [], { stdio: 'pipe' });
    const engine = new UciEngine(child, options);
    try {
      engine.send('uci');
      await engine.waitFor((line) => line === 'uciok', options.startupTimeoutMs, 'uciok');
      await engine.ready();
    } catch (error) {
      await engine.quit();
      throw error;
    }
    logger.info('Engine started', { path: options.path, pid: child.pid });
    return engine;
  }

  newGame(): Promise<void> {
    return this.enqueue(async () => {
      this.send('ucinewgame');
      await this.ready();
    });
  }

  play(board: BoardState, timeLimitMs: number): Promise<MoveToken> {
    return this.enqueue(async () => {
      const moves = board.moves.length > 0 ? ` moves ${board.moves.join(' ')}` : '';
      this.send(`position startpos${moves}`);
      this.send(`go movetime ${timeLimitMs}`);

      const grace = this.options.responseGraceMs ?? ENGINE_RESPONSE_GRACE_MS;
      const line = await this.waitFor(
        (candidate) => candidate.startsWith('bestmove'),
        timeLimitMs + grace,
        'bestmove',
        () => {
          this.staleBestmoves += 1;
          this.send('stop');
        }
      );
      const move = line.split(/\s+/)[1];
      if (move === undefined || move === '(none)') {
        throw new EngineUnavailableError('engine returned no move', { fen: board.fen });
      }
      return move;
    });
  }

  isRunning(): boolean {
    return this.exitError === null;
  }

  async quit(): Promise<void> {
    if (this.exitError !== null) {
      return;
    }
    this.send('quit');
    const outcome = await runWithTimeout(() => this.exited, {
      timeoutMs: this.options.quitTimeoutMs ?? DEFAULT_QUIT_TIMEOUT_MS,
    });
    if (outcome.kind === 'timeout') {
      logger.warn('Engine did not exit after quit; killing it');
      this.child.kill('SIGKILL');
      await this.exited;
    }
  }

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task, task);
    // Keep the queue alive regardless of this task's outcome.
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async ready(): Promise<void> {
    this.send('isready');
    await this.waitFor((line) => line === 'readyok', this.options.startupTimeoutMs, 'readyok');
  }

  private send(command: string): void {
    if (this.exitError !== null) {
      throw this.exitError;
    }
    logger.debug('Engine <', { command });
    this.child.stdin.write(`${command}\n`);
  }

  private onLine(raw: string): void {
    const line = raw.trim();
    if (line.length === 0) {
      return;
    }
    logger.debug('Engine >', { line });
    if (this.staleBestmoves > 0 && line.startsWith('bestmove')) {
      this.staleBestmoves -= 1;
      logger.debug('Discarding reply to an abandoned search', { line });
      return;
    }
    const waiter = this.waiter;
    if (waiter && waiter.matches(line)) {
      this.waiter = null;
      waiter.resolve(line);
    }
  }

  private fail(error: EngineUnavailableError): void {
    if (this.exitError === null) {
      this.exitError = error;
    }
    const waiter = this.waiter;
    this.waiter = null;
    waiter?.reject(error);
  }

  private async waitFor(
    matches: (line: string) => boolean,
    timeoutMs: number,
    expected: string,
    onTimeout?: () => void
  ): Promise<string> {
    if (this.exitError !== null) {
      throw this.exitError;
    }
    const response = new Promise<string>((resolve, reject) => {
      this.waiter = { matches, resolve, reject };
    });
    const outcome = await runWithTimeout(() => response, { timeoutMs });
    if (outcome.kind === 'timeout') {
      this.waiter = null;
      onTimeout?.();
      throw new EngineUnavailableError(`no ${expected} within ${timeoutMs}ms`);
    }
    return outcome.value;
  }
}

/**
 * Acquire an engine for the duration of `fn` and always terminate it
 * afterwards, including when `fn` throws.
 */
export async function withEngine<T>(
  acquire: () => Promise<MoveSearchEngine>,
  fn: (engine: MoveSearchEngine) => Promise<T>
): Promise<T> {
  const engine = await acquire();
  try {
    return await fn(engine);
  } finally {
    await engine.quit();
  }
}
