import { randomInt as cryptoRandomInt } from 'node:crypto';
import { CARD_NUMBERS, COPIES_PER_NUMBER, type Card } from '../types/cards.js';

/** Returns an integer in `[0, maxExclusive)`. */
export type RandomInt = (maxExclusive: number) => number;

export const defaultRandomInt: RandomInt = (maxExclusive) => cryptoRandomInt(maxExclusive);

export function createDeck(): Card[] {
  const deck: Card[] = [];
  let id = 0;
  for (const number of CARD_NUMBERS) {
    for (let copy = 0; copy < COPIES_PER_NUMBER; copy += 1) {
      deck.push(Object.freeze({ id, number }));
      id += 1;
    }
  }
  return deck;
}

export function shuffleCards<T>(items: readonly T[], randomInt: RandomInt = defaultRandomInt): T[] {
  const shuffled = [...items];
  for (let i = shuffled.length - 1; i > 0; i -= 1) {
    const j = randomInt(i + 1);
    [shuffled[i], shuffled[j]] = [shuffled[j], shuffled[i]];
  }
  return shuffled;
}

export function newDeck(randomInt: RandomInt = defaultRandomInt): Card[] {
  return shuffleCards(createDeck(), randomInt);
}

export interface DealLayout {
  handSize: number;
  middleSize: number;
}

const DEAL_TABLE: Record<number, DealLayout> = {
  3: { handSize: 9, middleSize: 9 },
  4: { handSize: 7, middleSize: 8 },
  5: { handSize: 6, middleSize: 6 },
  6: { handSize: 5, middleSize: 6 },
};

/** Smallest and largest tables the deal table covers. */
export const MIN_SEATS = 3;
export const MAX_SEATS = 6;

const FALLBACK_LAYOUT: DealLayout = { handSize: 5, middleSize: 6 };

export function getDealLayout(playerCount: number): DealLayout {
  return DEAL_TABLE[playerCount] ?? FALLBACK_LAYOUT;
}
