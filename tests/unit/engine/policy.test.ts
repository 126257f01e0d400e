import {
  classifyChatMessage,
  decideDrawOffer,
  decideResignation,
  decideTakebackOffer,
  matchesKeyword,
  RESIGN_PIECE_THRESHOLD,
  type PolicyConfig,
} from '../../../src/shared/engine/policy';
import type { BoardState } from '../../../src/shared/types/chess';

const basePolicy: PolicyConfig = {
  drawAcceptChance: 0.3,
  takebackAcceptChance: 0.2,
  resignChance: 0.1,
  minMovesForDraw: 10,
  moveDelayMs: 0,
  drawKeywords: ['draw', 'ничья', 'peace'],
  takebackKeywords: ['takeback', 'отмена', 'back', 'undo'],
};

const boardWith = (pieceCount: number): BoardState => ({
  fen: '8/8/8/8/8/8/8/8 w - - 0 1',
  moves: [],
  pieceCount,
  turn: 'white',
});

const always = (value: number) => () => value;

describe('policy engine', () => {
  describe('decideDrawOffer', () => {
    it('declines before the minimum move count without consulting the random source', () => {
      const random = jest.fn(() => 0);
      const policy = { ...basePolicy, drawAcceptChance: 1.0 };
      expect(decideDrawOffer(5, policy, random)).toBe('decline');
      expect(random).not.toHaveBeenCalled();
    });

    it('accepts at certainty once the gate is passed', () => {
      expect(decideDrawOffer(20, { ...basePolicy, drawAcceptChance: 1.0 }, Math.random)).toBe(
        'accept'
      );
    });

    it('never accepts at zero chance', () => {
      expect(decideDrawOffer(20, { ...basePolicy, drawAcceptChance: 0 }, always(0))).toBe(
        'decline'
      );
    });

    it('treats the minimum move count as inclusive', () => {
      expect(decideDrawOffer(10, basePolicy, always(0.29))).toBe('accept');
      expect(decideDrawOffer(9, basePolicy, always(0.29))).toBe('decline');
    });

    it('compares strictly against the chance', () => {
      expect(decideDrawOffer(20, basePolicy, always(0.3))).toBe('decline');
    });
  });

  describe('decideTakebackOffer', () => {
    it('accepts iff the draw is below the chance', () => {
      expect(decideTakebackOffer(basePolicy, always(0.19))).toBe('accept');
      expect(decideTakebackOffer(basePolicy, always(0.2))).toBe('decline');
    });

    it('handles the certainty bounds', () => {
      expect(decideTakebackOffer({ ...basePolicy, takebackAcceptChance: 1.0 }, Math.random)).toBe(
        'accept'
      );
      expect(decideTakebackOffer({ ...basePolicy, takebackAcceptChance: 0 }, always(0))).toBe(
        'decline'
      );
    });
  });

  describe('decideResignation', () => {
    it('uses a threshold of ten pieces', () => {
      expect(RESIGN_PIECE_THRESHOLD).toBe(10);
    });

    it('resigns on a winning draw with fewer than ten pieces', () => {
      expect(decideResignation(boardWith(9), basePolicy, always(0.05))).toBe('resign');
    });

    it('continues with ten or more pieces on the board', () => {
      expect(decideResignation(boardWith(10), basePolicy, always(0))).toBe('continue');
      expect(decideResignation(boardWith(32), basePolicy, always(0))).toBe('continue');
    });

    it('continues when the draw misses the chance', () => {
      expect(decideResignation(boardWith(3), basePolicy, always(0.1))).toBe('continue');
    });

    it('never resigns at zero chance', () => {
      expect(decideResignation(boardWith(2), { ...basePolicy, resignChance: 0 }, always(0))).toBe(
        'continue'
      );
    });
  });

  describe('chat classification', () => {
    it('matches keywords case-insensitively as substrings', () => {
      expect(matchesKeyword('Would you like a DRAW?', ['draw'])).toBe(true);
      expect(matchesKeyword('good game', ['draw'])).toBe(false);
    });

    it('classifies draw and takeback proposals', () => {
      expect(classifyChatMessage('would you like a draw?', basePolicy)).toBe('draw');
      expect(classifyChatMessage('Ничья?', basePolicy)).toBe('draw');
      expect(classifyChatMessage('please UNDO that', basePolicy)).toBe('takeback');
      expect(classifyChatMessage('hello there', basePolicy)).toBeNull();
    });

    it('prefers draw when both keyword sets match', () => {
      expect(classifyChatMessage('undo or draw?', basePolicy)).toBe('draw');
    });
  });
});
