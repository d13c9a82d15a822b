/**
 * AI Player Interface and Base Class
 * Defines the contract for AI players and provides base functionality
 */

import type { Board } from '../../../shared/engine/Board';
import type { Move, Player } from '../../../shared/types/game';
import { createLocalAIRng, type LocalAIRng } from '../../../shared/ai/rng';

export interface AIConfig {
  difficulty: number; // 1-10 scale
  searchDepth?: number; // Plies searched before static evaluation
  randomness?: number; // 0-1 chance of a random legal move
  seed?: number; // Seed for the random policy; identical seeds play identically
}

/**
 * Anything that can produce the next move for a board: AI players, or an
 * adapter over an external input path.
 */
export interface MoveSource {
  selectMove(board: Board): Move | string;
}

/**
 * Base AI Player class
 * All AI implementations should extend this class
 */
export abstract class AIPlayer implements MoveSource {
  protected config: Required<Omit<AIConfig, 'seed'>> & { seed: number };
  protected color: Player;
  protected rng: LocalAIRng;

  constructor(color: Player, config: AIConfig) {
    this.color = color;
    const preset = AI_DIFFICULTY_PRESETS[config.difficulty] ?? {};
    this.config = {
      difficulty: config.difficulty,
      searchDepth: config.searchDepth ?? preset.searchDepth ?? 4,
      randomness: config.randomness ?? preset.randomness ?? 0,
      seed: config.seed ?? 0,
    };
    this.rng = createLocalAIRng(this.config.seed);
  }

  /**
   * Main method to select a move for the current board. Runs to completion
   * before returning; never mutates BOARD.
   */
  abstract selectMove(board: Board): Move;

  /**
   * Get the AI's difficulty level (1-10)
   */
  getDifficulty(): number {
    return this.config.difficulty;
  }

  getColor(): Player {
    return this.color;
  }

  getSearchDepth(): number {
    return this.config.searchDepth;
  }

  /**
   * Returns true if the player should pick a random move instead of the
   * best one.
   */
  protected shouldPickRandomMove(): boolean {
    return this.config.randomness > 0 && this.rng() < this.config.randomness;
  }

  /**
   * Get a random element from an array
   */
  protected getRandomElement<T>(array: readonly T[]): T | undefined {
    if (array.length === 0) return undefined;
    return array[Math.floor(this.rng() * array.length)];
  }
}

/**
 * AI Difficulty Presets
 */
export const AI_DIFFICULTY_PRESETS: Record<number, Partial<AIConfig>> = {
  1: { difficulty: 1, searchDepth: 1, randomness: 0.5 }, // Very Easy - 50% random
  2: { difficulty: 2, searchDepth: 1, randomness: 0.3 }, // Easy - 30% random
  3: { difficulty: 3, searchDepth: 2, randomness: 0.2 }, // Medium-Easy - 20% random
  4: { difficulty: 4, searchDepth: 2, randomness: 0.1 }, // Medium - 10% random
  5: { difficulty: 5, searchDepth: 3, randomness: 0.05 }, // Medium-Hard - 5% random
  6: { difficulty: 6, searchDepth: 3, randomness: 0.02 }, // Hard - 2% random
  7: { difficulty: 7, searchDepth: 4, randomness: 0.01 }, // Very Hard - 1% random
  8: { difficulty: 8, searchDepth: 4, randomness: 0 }, // Expert - No randomness
  9: { difficulty: 9, searchDepth: 5, randomness: 0 }, // Master - No randomness
  10: { difficulty: 10, searchDepth: 6, randomness: 0 }, // Grandmaster - No randomness
};

/**
 * Difficulty level whose preset lies closest to the given depth and
 * randomness: nearest search depth first, then nearest randomness, then the
 * lower level.
 */
export function nearestDifficulty(searchDepth: number, randomness: number): number {
  let best = 1;
  let bestDepthGap = Number.POSITIVE_INFINITY;
  let bestRandomnessGap = Number.POSITIVE_INFINITY;
  for (let level = 1; level <= 10; level += 1) {
    const preset = AI_DIFFICULTY_PRESETS[level];
    const depthGap = Math.abs((preset.searchDepth ?? 0) - searchDepth);
    const randomnessGap = Math.abs((preset.randomness ?? 0) - randomness);
    if (
      depthGap < bestDepthGap ||
      (depthGap === bestDepthGap && randomnessGap < bestRandomnessGap)
    ) {
      best = level;
      bestDepthGap = depthGap;
      bestRandomnessGap = randomnessGap;
    }
  }
  return best;
}
