import type { Card } from './cards.js';

export type PlayerId = string;

export type HandPosition = 'lowest' | 'highest';

export const HAND_POSITIONS: readonly HandPosition[] = ['lowest', 'highest'];

/** Server-side seat. `hand` is always sorted ascending by number. */
export interface Player {
  id: PlayerId;
  name: string;
  hand: Card[];
  trios: Card[][];
  connected: boolean;
}

export interface PublicPlayerView {
  id: PlayerId;
  name: string;
  card_count: number;
  trio_count: number;
  trios: number[][];
  connected: boolean;
}

export interface SerializedCard {
  id: number;
  number: number | null;
  face_up: boolean;
}

export interface PrivateHandView {
  hand: SerializedCard[];
  lowest: number | null;
  highest: number | null;
}
