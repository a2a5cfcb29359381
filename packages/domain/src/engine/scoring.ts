import type { CardNumber } from '../types/cards.js';
import type { FinalScore } from '../types/events.js';
import type { GameMode, RoomState, WinReason } from '../types/game.js';
import type { Player } from '../types/player.js';

export const INSTANT_WIN_NUMBER: CardNumber = 7;
export const SIMPLE_TRIOS_TO_WIN = 3;
export const SPICY_TRIOS_TO_WIN = 2;

/**
 * Numbers within distance 2 of each other. The ends of the range have fewer
 * neighbours (1 and 12 only reach inward).
 */
export const CONNECTED_NUMBERS: Readonly<Record<CardNumber, readonly CardNumber[]>> = {
  1: [2, 3],
  2: [1, 3, 4],
  3: [1, 2, 4, 5],
  4: [2, 3, 5, 6],
  5: [3, 4, 6, 7],
  6: [4, 5, 7, 8],
  7: [5, 6, 8, 9],
  8: [6, 7, 9, 10],
  9: [7, 8, 10, 11],
  10: [8, 9, 11, 12],
  11: [9, 10, 12],
  12: [10, 11],
};

export function areConnected(a: CardNumber, b: CardNumber): boolean {
  return CONNECTED_NUMBERS[a].includes(b);
}

export interface WinResult {
  reason: WinReason;
  description: string;
}

export function trioNumbers(player: Player): CardNumber[] {
  return player.trios.flatMap((trio) => (trio[0] ? [trio[0].number] : []));
}

export function evaluateWin(player: Player, mode: GameMode): WinResult | null {
  const numbers = trioNumbers(player);

  if (numbers.includes(INSTANT_WIN_NUMBER)) {
    return { reason: '7-trio', description: 'Got the legendary 7-7-7 trio!' };
  }

  switch (mode) {
    case 'simple':
      if (numbers.length >= SIMPLE_TRIOS_TO_WIN) {
        return { reason: '3 trios', description: 'Collected 3 trios!' };
      }
      return null;
    case 'spicy': {
      if (numbers.length < SPICY_TRIOS_TO_WIN) {
        return null;
      }
      for (let i = 0; i < numbers.length; i += 1) {
        for (let j = i + 1; j < numbers.length; j += 1) {
          const a = numbers[i];
          const b = numbers[j];
          if (areConnected(a, b)) {
            return {
              reason: `connected trios (${a},${b})`,
              description: `Got 2 connected trios (${a} ↔ ${b})!`,
            };
          }
        }
      }
      return null;
    }
  }
}

/** Sorted by trio count, descending; equal counts keep join order. */
export function buildFinalScores(state: RoomState): FinalScore[] {
  return state.players
    .map((player) => ({ player_id: player.id, name: player.name, trios: player.trios.length }))
    .sort((a, b) => b.trios - a.trios);
}
