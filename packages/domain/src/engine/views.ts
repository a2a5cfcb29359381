import type { Card } from '../types/cards.js';
import type { GameStateMessage, MiddleSlotView, RevealedCardView } from '../types/events.js';
import type { RevealEntry, RoomState, RoomSummary } from '../types/game.js';
import type { Player, PrivateHandView, PublicPlayerView, SerializedCard } from '../types/player.js';
import { getCurrentPlayer } from './validation.js';

export function serializeCard(card: Card, faceUp = true): SerializedCard {
  return {
    id: card.id,
    number: faceUp ? card.number : null,
    face_up: faceUp,
  };
}

export function toPublicPlayer(player: Player): PublicPlayerView {
  return {
    id: player.id,
    name: player.name,
    card_count: player.hand.length,
    trio_count: player.trios.length,
    trios: player.trios.map((trio) => trio.map((card) => card.number)),
    connected: player.connected,
  };
}

export function toPrivateHand(player: Player): PrivateHandView {
  const lowest = player.hand[0];
  const highest = player.hand[player.hand.length - 1];
  return {
    hand: player.hand.map((card) => serializeCard(card)),
    lowest: lowest ? lowest.number : null,
    highest: highest ? highest.number : null,
  };
}

export function buildRoomSummary(state: RoomState): RoomSummary {
  const current = getCurrentPlayer(state);
  return {
    id: state.roomId,
    name: state.name,
    mode: state.mode,
    player_count: state.players.length,
    max_players: state.config.maxPlayers,
    min_players: state.config.minPlayers,
    state: state.phase,
    players: state.players.map(toPublicPlayer),
    current_player: current?.name ?? null,
    current_player_id: current?.id ?? null,
  };
}

export function toRevealedCardView(entry: RevealEntry): RevealedCardView {
  return {
    card: serializeCard(entry.card),
    source: entry.originLabel,
    source_id: entry.origin.kind === 'hand' ? entry.origin.playerId : null,
    position: entry.origin.kind === 'hand' ? entry.origin.position : null,
  };
}

export function buildGameState(state: RoomState): GameStateMessage {
  const middleCards: MiddleSlotView[] = state.middle.map((slot) => ({
    id: slot.card.id,
    number: slot.visibility === 'face-up' ? slot.card.number : null,
    face_up: slot.visibility === 'face-up',
    taken: slot.visibility === 'taken',
  }));
  const current = getCurrentPlayer(state);

  return {
    type: 'game_state',
    players: state.players.map(toPublicPlayer),
    middle_cards: middleCards,
    middle_card_count: state.middle.filter((slot) => slot.visibility === 'face-down').length,
    revealed_this_turn: state.revealSequence.map(toRevealedCardView),
    current_player: current?.name ?? null,
    current_player_id: current?.id ?? null,
  };
}
