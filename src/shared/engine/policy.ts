import type { BoardState } from '../types/chess';

/**
 * Discretionary decisions the bot takes on its own: whether to accept a draw
 * or takeback offer and whether to give up. Each one is a biased coin flip
 * against a configured probability. The functions only decide; the session
 * controller performs (and logs) the resulting action.
 */

export interface PolicyConfig {
  /** Probability of accepting a draw once `minMovesForDraw` is reached. */
  drawAcceptChance: number;
  /** Probability of accepting a takeback offer. */
  takebackAcceptChance: number;
  /** Probability of resigning when the position qualifies. */
  resignChance: number;
  /** Minimum ply count before any draw offer can be accepted. */
  minMovesForDraw: number;
  /** Pause before computing and submitting our move. */
  moveDelayMs: number;
  /** Lower-cased substrings that mark a chat line as a draw proposal. */
  drawKeywords: readonly string[];
  /** Lower-cased substrings that mark a chat line as a takeback proposal. */
  takebackKeywords: readonly string[];
}

export type OfferDecision = 'accept' | 'decline';
export type ResignationDecision = 'resign' | 'continue';
export type ChatProposal = 'draw' | 'takeback';

/** Uniform source in [0, 1). */
export type RandomSource = () => number;

/**
 * Fewer pieces than this on the board makes resignation possible. A crude
 * stand-in for "losing": it looks at neither side's material.
 */
export const RESIGN_PIECE_THRESHOLD = 10;

export function decideDrawOffer(
  moveCount: number,
  config: PolicyConfig,
  random: RandomSource = Math.random
): OfferDecision {
  if (moveCount < config.minMovesForDraw) {
    return 'decline';
  }
  return random() < config.drawAcceptChance ? 'accept' : 'decline';
}

export function decideTakebackOffer(
  config: PolicyConfig,
  random: RandomSource = Math.random
): OfferDecision {
  return random() < config.takebackAcceptChance ? 'accept' : 'decline';
}

export function decideResignation(
  board: BoardState,
  config: PolicyConfig,
  random: RandomSource = Math.random
): ResignationDecision {
  if (random() < config.resignChance && board.pieceCount < RESIGN_PIECE_THRESHOLD) {
    return 'resign';
  }
  return 'continue';
}

export function matchesKeyword(text: string, keywords: readonly string[]): boolean {
  const lowered = text.toLowerCase();
  return keywords.some((keyword) => lowered.includes(keyword.toLowerCase()));
}

/**
 * Classify a chat line as a draw or takeback proposal. Draw wins when both
 * keyword sets match.
 */
export function classifyChatMessage(text: string, config: PolicyConfig): ChatProposal | null {
  if (matchesKeyword(text, config.drawKeywords)) {
    return 'draw';
  }
  if (matchesKeyword(text, config.takebackKeywords)) {
    return 'takeback';
  }
  return null;
}
