import { Board } from '../../../shared/engine/Board';
import { EngineError, EngineErrorCode, InvalidState } from '../../../shared/engine/errors';
import { INFINITY_SCORE, staticScore } from '../../../shared/engine/heuristicEvaluation';
import { enumerateLegalMoves, hasLegalMove } from '../../../shared/engine/moveGeneration';
import { PASS } from '../../../shared/engine/moves';
import { formatMove } from '../../../shared/engine/notation';
import type { PieceMove } from '../../../shared/types/game';
import { isSearchTraceEnabled } from '../../../shared/utils/envFlags';
import { logger } from '../../utils/logger';

/** +1 when the side to move maximises (RED), −1 when it minimises (BLUE). */
export type SearchSense = 1 | -1;

export interface SearchOptions {
  /**
   * Alpha-beta cutoffs. Disabling them runs plain minimax, which visits
   * every node but must return the same score and move.
   */
  pruning?: boolean;
}

export interface SearchResult {
  move: PieceMove;
  /** Value of the chosen move from RED's point of view. */
  score: number;
  nodesVisited: number;
  depth: number;
}

function invert(sense: SearchSense): SearchSense {
  return sense === 1 ? -1 : 1;
}

interface SearchContext {
  pruning: boolean;
  trace: boolean;
  nodesVisited: number;
  bestMove: PieceMove | null;
}

/**
 * Depth-limited minimax with alpha-beta pruning over a single signed score
 * (positive favours RED).
 *
 * The search works on a private copy of the caller's board and walks the
 * tree by applying and undoing moves on that copy; every apply is undone
 * before the next sibling is tried, whichever way the loop exits.
 */
export class MinimaxSearch {
  /**
   * Best move for the side to move on BOARD, searched DEPTH plies deep.
   * BOARD itself is never touched.
   *
   * @throws InvalidState when the game is over or the side to move can only
   *   pass; callers pass without searching in that case.
   */
  findBestMove(board: Board, depth: number, options: SearchOptions = {}): SearchResult {
    if (!Number.isInteger(depth) || depth < 1) {
      throw new EngineError(
        EngineErrorCode.INTERNAL_ASSERTION_FAILED,
        `Search depth must be a positive integer, got ${depth}`,
        { depth },
        'Search'
      );
    }

    const work = new Board({ copyFrom: board });
    const mover = work.whoseMove();

    if (work.getWinner() !== null) {
      throw new InvalidState(
        EngineErrorCode.STATE_GAME_OVER,
        'Cannot search a finished game',
        { winner: work.getWinner() },
        'Search'
      );
    }
    if (!hasLegalMove(work)) {
      throw new InvalidState(
        EngineErrorCode.STATE_NO_LEGAL_MOVES,
        `${mover} has no legal move; pass instead of searching`,
        { sideToMove: mover },
        'Search'
      );
    }

    const context: SearchContext = {
      pruning: options.pruning ?? true,
      trace: isSearchTraceEnabled(),
      nodesVisited: 0,
      bestMove: null,
    };
    const sense: SearchSense = mover === 'red' ? 1 : -1;

    const score = this.minMax(work, depth, true, sense, -INFINITY_SCORE, INFINITY_SCORE, context);

    if (!context.bestMove) {
      throw new EngineError(
        EngineErrorCode.INTERNAL_ASSERTION_FAILED,
        'Search finished without choosing a move',
        { sideToMove: mover, depth },
        'Search'
      );
    }

    return {
      move: context.bestMove,
      score,
      nodesVisited: context.nodesVisited,
      depth,
    };
  }

  /**
   * Value of BOARD searched DEPTH plies deep. Maximises when SENSE is 1 and
   * minimises when it is −1. At the root the move reaching the best value
   * first is recorded in CONTEXT; inner calls never touch it.
   */
  private minMax(
    board: Board,
    depth: number,
    isRoot: boolean,
    sense: SearchSense,
    alpha: number,
    beta: number,
    context: SearchContext
  ): number {
    context.nodesVisited += 1;

    if (depth === 0 || board.getWinner() !== null) {
      return staticScore(board, depth);
    }

    const moves = enumerateLegalMoves(board);

    // Only a pass is available below the root: the position is worth what
    // it is worth after the pass.
    if (moves.length === 0) {
      board.applyMove(PASS);
      try {
        return this.minMax(board, depth - 1, false, invert(sense), alpha, beta, context);
      } finally {
        board.undo();
      }
    }

    let bestScore = sense === 1 ? -INFINITY_SCORE : INFINITY_SCORE;

    for (const move of moves) {
      board.applyMove(move);
      let response: number;
      try {
        response = this.minMax(board, depth - 1, false, invert(sense), alpha, beta, context);
      } finally {
        board.undo();
      }

      if (isRoot && context.trace) {
        logger.debug('Search root candidate', { move: formatMove(move), score: response, depth });
      }

      if (sense === 1) {
        if (response > bestScore) {
          bestScore = response;
          if (isRoot) {
            context.bestMove = move;
          }
        }
        alpha = Math.max(alpha, bestScore);
      } else {
        if (response < bestScore) {
          bestScore = response;
          if (isRoot) {
            context.bestMove = move;
          }
        }
        beta = Math.min(beta, bestScore);
      }

      if (context.pruning && alpha >= beta) {
        break;
      }
    }

    return bestScore;
  }
}
