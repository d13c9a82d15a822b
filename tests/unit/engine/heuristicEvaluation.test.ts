import { Board } from '../../../src/shared/engine/Board';
import { WINNING_VALUE, staticScore } from '../../../src/shared/engine/heuristicEvaluation';
import { SINGLE_MOVE_ROWS, boardAfter, layout, swapColors } from '../../utils/fixtures';

describe('staticScore', () => {
  it('scores undecided positions as red pieces minus blue pieces', () => {
    expect(staticScore(new Board(), 3)).toBe(0);
    expect(staticScore(boardAfter(['a1-a2']), 3)).toBe(1);
    expect(staticScore(boardAfter(['a1-a3', 'a7-a6']), 0)).toBe(-1);
  });

  it('ranks a red win above any material edge, sooner wins higher', () => {
    const board = layout(SINGLE_MOVE_ROWS);
    board.applyMove('a1-a2');

    expect(staticScore(board, 0)).toBe(WINNING_VALUE);
    expect(staticScore(board, 2)).toBe(WINNING_VALUE + 2);
  });

  it('mirrors the score for a blue win', () => {
    const board = layout(swapColors(SINGLE_MOVE_ROWS), 'blue');
    board.applyMove('a1-a2');

    expect(board.getWinner()).toBe('blue');
    expect(staticScore(board, 1)).toBe(-(WINNING_VALUE + 1));
  });

  it('scores a draw as zero', () => {
    const board = layout([
      'XXXXXXb',
      'XXXXXXX',
      'XXXXXXX',
      'XXX-XXX',
      'XXXXXXX',
      'XXXXXXX',
      'rXXXXXX',
    ]);
    expect(board.getWinner()).toBe('draw');
    expect(staticScore(board, 4)).toBe(0);
  });
});
