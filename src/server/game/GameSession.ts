import type { Board } from '../../shared/engine/Board';
import { EngineErrorCode, InvalidState, wrapEngineError } from '../../shared/engine/errors';
import { formatMove, parseMove } from '../../shared/engine/notation';
import type { VictoryReason } from '../../shared/engine/victoryLogic';
import type { GameOutcome, Move, Player } from '../../shared/types/game';
import { logger, type LogMeta } from '../utils/logger';
import type { MoveSource } from './ai/AIPlayer';

export interface PlyRecord {
  ply: number;
  player: Player;
  move: Move;
  notation: string;
}

export interface SessionResult {
  /** Null when the ply cap was reached before the game ended. */
  winner: GameOutcome | null;
  reason: VictoryReason | null;
  plies: number;
  moves: string[];
}

export type SessionPlayers = Record<Player, MoveSource>;

/**
 * Drives one game on an authoritative board, asking the move source of the
 * side to move for each ply.
 *
 * Move sources only ever see the live board; AI players search private
 * copies, so nothing they do can race with the session's own mutations.
 */
export class GameSession {
  private readonly board: Board;
  private readonly players: SessionPlayers;
  private readonly records: PlyRecord[] = [];

  constructor(board: Board, players: SessionPlayers) {
    this.board = board;
    this.players = players;
  }

  getBoard(): Board {
    return this.board;
  }

  getRecords(): readonly PlyRecord[] {
    return this.records;
  }

  isOver(): boolean {
    return this.board.getWinner() !== null;
  }

  /**
   * Play one ply.
   *
   * @throws InvalidState when the game is already over
   * @throws IllegalMove when the move source returns an illegal move
   */
  step(): PlyRecord {
    if (this.isOver()) {
      throw new InvalidState(
        EngineErrorCode.STATE_GAME_OVER,
        'Game is already over',
        { winner: this.board.getWinner() },
        'GameSession'
      );
    }

    const player = this.board.whoseMove();
    const selected = this.players[player].selectMove(this.board);

    let move: Move;
    try {
      move = typeof selected === 'string' ? parseMove(selected) : selected;
      this.board.applyMove(move);
    } catch (err) {
      const error = wrapEngineError(err, 'GameSession', { player });
      logger.error('Move source produced an unplayable move', {
        player,
        move: typeof selected === 'string' ? selected : formatMove(selected),
        error,
      });
      throw error;
    }

    const record: PlyRecord = {
      ply: this.records.length + 1,
      player,
      move,
      notation: formatMove(move),
    };
    this.records.push(record);
    logger.debug('Move played', { ply: record.ply, player, move: record.notation });
    return record;
  }

  /**
   * Step until the game ends or `maxPlies` more plies have been played.
   */
  run(maxPlies: number = Number.POSITIVE_INFINITY): SessionResult {
    let played = 0;
    while (!this.isOver() && played < maxPlies) {
      this.step();
      played += 1;
    }

    const result: SessionResult = {
      winner: this.board.getWinner(),
      reason: this.board.getVictoryReason(),
      plies: this.records.length,
      moves: this.records.map((r) => r.notation),
    };

    const meta: LogMeta = {
      winner: result.winner,
      reason: result.reason,
      plies: result.plies,
      red: this.board.redPieces(),
      blue: this.board.bluePieces(),
    };
    if (result.winner !== null) {
      logger.info('Game finished', meta);
    } else {
      logger.info('Game paused at ply cap', meta);
    }

    return result;
  }
}
