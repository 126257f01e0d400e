import type { Color } from '../types/chess';

/**
 * Explicit lifecycle of one bot-played game.
 *
 * State transitions:
 *   awaiting_color_assignment → active → terminated
 *   awaiting_color_assignment → terminated   (stream ended or failed early)
 *
 * `moveCount` is the length of the last token sequence the service sent; it
 * is recomputed on every incremental state and never advanced locally.
 */

export type TerminationReason =
  | 'game_over'
  | 'resigned'
  | 'stream_ended'
  | 'error';

export interface AwaitingColorAssignmentSession {
  kind: 'awaiting_color_assignment';
  gameId: string;
}

export interface ActiveSession {
  kind: 'active';
  gameId: string;
  color: Color;
  moveCount: number;
}

export interface TerminatedSession {
  kind: 'terminated';
  gameId: string;
  /** Absent when the session ended before colours were assigned. */
  color?: Color | undefined;
  moveCount: number;
  reason: TerminationReason;
  /** Game status reported by the service, for `game_over`. */
  status?: string | undefined;
}

export type GameSessionState =
  | AwaitingColorAssignmentSession
  | ActiveSession
  | TerminatedSession;

export function initialSessionState(gameId: string): GameSessionState {
  return { kind: 'awaiting_color_assignment', gameId };
}

export function isTerminated(state: GameSessionState): state is TerminatedSession {
  return state.kind === 'terminated';
}

export function markActive(
  state: GameSessionState,
  color: Color,
  moveCount: number
): GameSessionState {
  if (state.kind !== 'awaiting_color_assignment') {
    return state;
  }
  return { kind: 'active', gameId: state.gameId, color, moveCount };
}

export function withMoveCount(state: GameSessionState, moveCount: number): GameSessionState {
  if (state.kind !== 'active') {
    return state;
  }
  return { ...state, moveCount };
}

export function markTerminated(
  state: GameSessionState,
  reason: TerminationReason,
  status?: string
): TerminatedSession {
  if (state.kind === 'terminated') {
    return state;
  }
  return {
    kind: 'terminated',
    gameId: state.gameId,
    color: state.kind === 'active' ? state.color : undefined,
    moveCount: state.kind === 'active' ? state.moveCount : 0,
    reason,
    ...(status !== undefined && { status }),
  };
}
