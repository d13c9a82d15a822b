/**
 * Seeded random sources for AI move policies.
 *
 * The search engine itself is deterministic; randomness (random openings,
 * occasional random moves at low difficulty) is layered on top through
 * these helpers so a fixed seed reproduces a game exactly.
 */

export type LocalAIRng = () => number;

/**
 * Create a deterministic RNG from a seed (mulberry32). Returns values in
 * [0, 1).
 */
export function createLocalAIRng(seed: number): LocalAIRng {
  let state = seed;

  return (): number => {
    state |= 0;
    state = (state + 0x6d2b79f5) | 0;
    let t = Math.imul(state ^ (state >>> 15), 1 | state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Derive a per-player seed from a base seed so two AIs sharing one
 * configured seed do not mirror each other's choices.
 */
export function derivePlayerSeed(baseSeed: number, playerIndex: number): number {
  return (baseSeed * 31 + playerIndex * 17) >>> 0;
}
