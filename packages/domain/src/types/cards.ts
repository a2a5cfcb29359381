export const CARD_NUMBERS = [1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12] as const;
export type CardNumber = typeof CARD_NUMBERS[number];

export const COPIES_PER_NUMBER = 3;
export const DECK_SIZE = CARD_NUMBERS.length * COPIES_PER_NUMBER;

export type CardId = number;

export interface Card {
  readonly id: CardId;
  readonly number: CardNumber;
}

export function compareCards(a: Card, b: Card): number {
  return a.number - b.number;
}

export function isCardNumber(value: unknown): value is CardNumber {
  return typeof value === 'number' && Number.isInteger(value) && value >= 1 && value <= 12;
}
