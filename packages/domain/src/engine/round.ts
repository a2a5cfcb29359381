import { compareCards, type Card } from '../types/cards.js';
import type { MiddleSlot, RoomState } from '../types/game.js';
import type { Player, PlayerId } from '../types/player.js';
import { assertEngine } from './errors.js';
import { type EngineResult, type Delivery, broadcast, privately } from './events.js';
import { type RandomInt, defaultRandomInt, getDealLayout, newDeck, shuffleCards } from './deck.js';
import { buildGameState, buildRoomSummary, toPrivateHand } from './views.js';
import { getCurrentPlayer, requirePlayer, requireWaiting } from './validation.js';

export const YOUR_TURN_MESSAGE = "It's your turn! Reveal cards to find a trio.";

export function sortHand(hand: readonly Card[]): Card[] {
  return [...hand].sort(compareCards);
}

interface DealResult {
  hands: Record<PlayerId, Card[]>;
  middle: MiddleSlot[];
}

export function dealCards(seating: readonly PlayerId[], deck: readonly Card[]): DealResult {
  const { handSize, middleSize } = getDealLayout(seating.length);
  assertEngine(
    deck.length >= seating.length * handSize + middleSize,
    'NOT_ENOUGH_PLAYERS',
    'Deck is too small for this table',
  );

  const hands: Record<PlayerId, Card[]> = {};
  let cursor = 0;
  for (const playerId of seating) {
    hands[playerId] = sortHand(deck.slice(cursor, cursor + handSize));
    cursor += handSize;
  }

  const middle = deck
    .slice(cursor, cursor + middleSize)
    .map((card): MiddleSlot => ({ card, visibility: 'face-down' }));

  return { hands, middle };
}

export function startGame(state: RoomState, playerId: PlayerId, randomInt: RandomInt = defaultRandomInt): EngineResult {
  requireWaiting(state, 'start the game');
  requirePlayer(state, playerId);
  assertEngine(
    state.players.length >= state.config.minPlayers,
    'NOT_ENOUGH_PLAYERS',
    `Need at least ${state.config.minPlayers} players to start`,
  );

  const seating = shuffleCards(
    state.players.map((player) => player.id),
    randomInt,
  );
  const { hands, middle } = dealCards(seating, newDeck(randomInt));

  const players: Player[] = state.players.map((player) => ({
    ...player,
    hand: hands[player.id] ?? [],
    trios: [],
  }));

  const next: RoomState = {
    ...state,
    phase: 'playing',
    players,
    seating,
    currentTurnIndex: 0,
    middle,
    revealSequence: [],
    updatedAt: Date.now(),
  };

  const current = getCurrentPlayer(next);
  const names = new Map(players.map((player) => [player.id, player.name]));
  const deliveries: Delivery[] = [
    broadcast({
      type: 'game_started',
      mode: next.mode,
      turn_order: seating.map((id) => names.get(id) ?? id),
      current_player: current?.name ?? null,
      current_player_id: current?.id ?? null,
      middle_card_count: middle.length,
      room: buildRoomSummary(next),
    }),
    ...players.map((player) => privately(player.id, { type: 'your_hand', hand: toPrivateHand(player) })),
  ];

  // Clients expect your_turn ahead of the first game_state.
  if (current) {
    deliveries.push(privately(current.id, { type: 'your_turn', message: YOUR_TURN_MESSAGE }));
  }
  deliveries.push(broadcast(buildGameState(next)));

  return { state: next, deliveries };
}
