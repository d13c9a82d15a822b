export * from './shared/engine';

export { createLocalAIRng, derivePlayerSeed } from './shared/ai/rng';
export type { LocalAIRng } from './shared/ai/rng';

export { MinimaxSearch } from './server/game/ai/MinimaxSearch';
export type { SearchOptions, SearchResult, SearchSense } from './server/game/ai/MinimaxSearch';
export { AIPlayer, AI_DIFFICULTY_PRESETS, nearestDifficulty } from './server/game/ai/AIPlayer';
export type { AIConfig, MoveSource } from './server/game/ai/AIPlayer';
export { MinimaxAIPlayer, createConfiguredAIPlayer } from './server/game/ai/MinimaxAIPlayer';
export type { MoveSelection } from './server/game/ai/MinimaxAIPlayer';
export { GameSession } from './server/game/GameSession';
export type { PlyRecord, SessionResult, SessionPlayers } from './server/game/GameSession';

export { config } from './server/config';
export type { AppConfig } from './server/config';
export { logger } from './server/utils/logger';
