import type { Board } from '../../../shared/engine/Board';
import { EngineErrorCode, InvalidState } from '../../../shared/engine/errors';
import { enumerateLegalMoves, hasLegalMove } from '../../../shared/engine/moveGeneration';
import { PASS } from '../../../shared/engine/moves';
import { formatMove } from '../../../shared/engine/notation';
import { derivePlayerSeed } from '../../../shared/ai/rng';
import type { Move, Player } from '../../../shared/types/game';
import { config, type AppConfig } from '../../config';
import { logger } from '../../utils/logger';
import { AIPlayer, nearestDifficulty } from './AIPlayer';
import { MinimaxSearch, type SearchResult } from './MinimaxSearch';

export interface MoveSelection {
  move: Move;
  /** How the move was chosen. */
  source: 'forced_pass' | 'random' | 'search';
  search?: SearchResult;
  elapsedMs: number;
}

/**
 * Automated player backed by {@link MinimaxSearch}.
 *
 * - No legal move: passes without searching.
 * - With probability `randomness`: a uniformly random legal move, drawn
 *   from the player's seeded RNG.
 * - Otherwise: the searched best move at the configured depth.
 */
export class MinimaxAIPlayer extends AIPlayer {
  private readonly search = new MinimaxSearch();

  selectMove(board: Board): Move {
    return this.selectMoveWithDetails(board).move;
  }

  /**
   * Like {@link selectMove}, also reporting how the move was chosen and the
   * search statistics.
   *
   * @throws InvalidState when it is not this player's turn or the game is over.
   */
  selectMoveWithDetails(board: Board): MoveSelection {
    if (board.whoseMove() !== this.color) {
      throw new InvalidState(
        EngineErrorCode.STATE_WRONG_SIDE_TO_MOVE,
        `${this.color} asked to move while ${board.whoseMove()} is on move`,
        { player: this.color, sideToMove: board.whoseMove() },
        'AIPlayer'
      );
    }
    if (board.getWinner() !== null) {
      throw new InvalidState(
        EngineErrorCode.STATE_GAME_OVER,
        'Game is already over',
        { winner: board.getWinner() },
        'AIPlayer'
      );
    }

    const start = performance.now();

    if (!hasLegalMove(board)) {
      logger.debug('AI passes', { player: this.color });
      return { move: PASS, source: 'forced_pass', elapsedMs: performance.now() - start };
    }

    if (this.shouldPickRandomMove()) {
      const move = this.getRandomElement(enumerateLegalMoves(board));
      if (move) {
        const elapsedMs = performance.now() - start;
        logger.debug('AI picked random move', {
          player: this.color,
          move: formatMove(move),
          elapsedMs,
        });
        return { move, source: 'random', elapsedMs };
      }
    }

    const result = this.search.findBestMove(board, this.config.searchDepth);
    const elapsedMs = performance.now() - start;

    logger.debug('AI search complete', {
      player: this.color,
      move: formatMove(result.move),
      score: result.score,
      depth: result.depth,
      nodesVisited: result.nodesVisited,
      elapsedMs,
    });

    return { move: result.move, source: 'search', search: result, elapsedMs };
  }
}

const PLAYER_INDEX: Record<Player, number> = { red: 1, blue: 2 };

/**
 * Build the automated player for COLOR from the `ai` configuration block.
 * The configured depth and randomness already carry any difficulty preset,
 * so they are passed explicitly and win over the preset lookup. Without a
 * configured difficulty, the player reports the level whose preset is
 * nearest to that depth and randomness.
 */
export function createConfiguredAIPlayer(
  color: Player,
  ai: AppConfig['ai'] = config.ai
): MinimaxAIPlayer {
  return new MinimaxAIPlayer(color, {
    difficulty: ai.difficulty ?? nearestDifficulty(ai.searchDepth, ai.randomness),
    searchDepth: ai.searchDepth,
    randomness: ai.randomness,
    seed: derivePlayerSeed(ai.seed, PLAYER_INDEX[color]),
  });
}
