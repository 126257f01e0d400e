import { Chess } from 'chess.js';
import { MalformedMoveError } from '../errors';
import { FIRST_MOVER, SECOND_MOVER, type BoardState, type Color, type MoveToken } from '../types/chess';

/**
 * Position tracking over a streamed move list.
 *
 * The game service only ever sends the full token sequence, so positions are
 * rebuilt from scratch on every decision rather than patched incrementally.
 * Legality is checked by chess.js; this module adds no rules of its own.
 */

const UCI_TOKEN = /^([a-h][1-8])([a-h][1-8])([qrbn])?$/;

/**
 * Split the service's space-separated move string into tokens.
 */
export function parseMoveList(moves: string): MoveToken[] {
  return moves.split(/\s+/).filter((token) => token.length > 0);
}

/**
 * Replay `moveTokens` from the standard initial position.
 *
 * @throws MalformedMoveError when a token is not a legal continuation of the
 *   position built from its predecessors.
 */
export function reconstruct(moveTokens: readonly MoveToken[]): BoardState {
  const chess = new Chess();

  moveTokens.forEach((token, ply) => {
    const match = UCI_TOKEN.exec(token);
    if (!match) {
      throw new MalformedMoveError(token, ply, { reason: 'not a UCI move' });
    }
    const [, from, to, promotion] = match;
    try {
      chess.move({ from, to, ...(promotion !== undefined && { promotion }) });
    } catch (error) {
      throw new MalformedMoveError(token, ply, {
        reason: error instanceof Error ? error.message : String(error),
        fen: chess.fen(),
      });
    }
  });

  return {
    fen: chess.fen(),
    moves: [...moveTokens],
    pieceCount: countPieces(chess),
    turn: chess.turn() === 'w' ? 'white' : 'black',
  };
}

function countPieces(chess: Chess): number {
  let count = 0;
  for (const rank of chess.board()) {
    for (const square of rank) {
      if (square !== null) {
        count += 1;
      }
    }
  }
  return count;
}

/**
 * Side to move after `moveTokens`, by parity alone.
 */
export function sideToMove(moveTokens: readonly MoveToken[]): Color {
  return moveTokens.length % 2 === 0 ? FIRST_MOVER : SECOND_MOVER;
}

/**
 * True iff it is `ourColor`'s turn after `moveTokens`. An empty sequence is
 * the first mover's turn.
 */
export function isOurTurn(moveTokens: readonly MoveToken[], ourColor: Color): boolean {
  return sideToMove(moveTokens) === ourColor;
}
