/**
 * Side to move. `white` always moves first.
 */
export type Color = 'white' | 'black';

export const FIRST_MOVER: Color = 'white';
export const SECOND_MOVER: Color = 'black';

/**
 * A single ply in UCI long algebraic notation, e.g. `e2e4` or `e7e8q`.
 */
export type MoveToken = string;

/**
 * Board position derived from a move list. Never stored: callers rebuild it
 * from the full token sequence whenever a decision needs it.
 */
export interface BoardState {
  /** FEN of the position after the last token. */
  fen: string;
  /** The tokens this position was built from, in order. */
  moves: readonly MoveToken[];
  /** Number of pieces (both sides, kings included) on the board. */
  pieceCount: number;
  /** Side to move in this position. */
  turn: Color;
}

/**
 * Status reported by the game service while a game is still being played.
 * Every other status value (mate, resign, draw, aborted, ...) is terminal.
 */
export const IN_PROGRESS_STATUS = 'started';
