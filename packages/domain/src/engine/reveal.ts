import type { Card, CardId } from '../types/cards.js';
import type { MiddleSlot, RevealEntry, RoomState } from '../types/game.js';
import { HAND_POSITIONS, type HandPosition, type Player, type PlayerId } from '../types/player.js';
import { EngineError, assertEngine } from './errors.js';
import { type Delivery, type EngineResult, broadcast, privately } from './events.js';
import { YOUR_TURN_MESSAGE, sortHand } from './round.js';
import { buildFinalScores, evaluateWin } from './scoring.js';
import { buildGameState, serializeCard, toPrivateHand } from './views.js';
import { findPlayer, getCurrentPlayer, requireActiveTurn } from './validation.js';

export const MIDDLE_LABEL = 'Middle';

/**
 * - `pending`: fewer than two cards exposed, nothing to decide yet
 * - `continue`: the last two match, the same seat keeps revealing
 * - `trio`: the last three match
 * - `fail`: the last two differ
 */
export type RevealOutcome = 'pending' | 'continue' | 'trio' | 'fail';

export interface RevealResult extends EngineResult {
  outcome: RevealOutcome;
  /** Set when the trio ended the game. */
  finished: boolean;
}

export function evaluateRevealSequence(numbers: readonly number[]): RevealOutcome {
  const length = numbers.length;
  if (length < 2) {
    return 'pending';
  }
  const last = numbers[length - 1];
  const previous = numbers[length - 2];
  if (length >= 3 && last === previous && previous === numbers[length - 3]) {
    return 'trio';
  }
  if (last !== previous) {
    return 'fail';
  }
  return 'continue';
}

export function isHandPosition(value: unknown): value is HandPosition {
  return typeof value === 'string' && (HAND_POSITIONS as readonly string[]).includes(value);
}

export function revealFromMiddle(state: RoomState, playerId: PlayerId, cardId: CardId): RevealResult {
  const actor = requireActiveTurn(state, playerId);

  const slotIndex = state.middle.findIndex((slot) => slot.card.id === cardId);
  if (slotIndex === -1) {
    throw new EngineError('CARD_NOT_FOUND', 'Card not found in middle');
  }
  const slot = state.middle[slotIndex];
  assertEngine(slot.visibility === 'face-down', 'CARD_ALREADY_FACE_UP', 'This card is already face up');

  const entry: RevealEntry = {
    card: slot.card,
    origin: { kind: 'middle', slotIndex },
    originLabel: MIDDLE_LABEL,
  };
  const next: RoomState = {
    ...state,
    middle: state.middle.map((candidate, index): MiddleSlot =>
      index === slotIndex ? { ...candidate, visibility: 'face-up' } : candidate,
    ),
    revealSequence: [...state.revealSequence, entry],
    updatedAt: Date.now(),
  };

  return evaluateReveal(next, [
    broadcast({
      type: 'card_revealed',
      card: serializeCard(entry.card),
      source: MIDDLE_LABEL,
      source_id: null,
      position: null,
      revealed_by: actor.name,
    }),
  ]);
}

export function revealFromPlayer(
  state: RoomState,
  playerId: PlayerId,
  targetPlayerId: PlayerId,
  position: string,
): RevealResult {
  const actor = requireActiveTurn(state, playerId);
  if (!isHandPosition(position)) {
    throw new EngineError('INVALID_POSITION', "Must reveal 'lowest' or 'highest'");
  }
  const target = findPlayer(state, targetPlayerId);
  if (!target) {
    throw new EngineError('PLAYER_NOT_FOUND', 'Player not found');
  }
  assertEngine(target.hand.length > 0, 'NO_CARDS', `${target.name} has no cards`);

  const card = position === 'lowest' ? target.hand[0] : target.hand[target.hand.length - 1];
  const remaining = position === 'lowest' ? target.hand.slice(1) : target.hand.slice(0, -1);
  const updatedTarget: Player = { ...target, hand: remaining };

  const entry: RevealEntry = {
    card,
    origin: { kind: 'hand', playerId: target.id, position },
    originLabel: target.name,
  };
  const next: RoomState = {
    ...state,
    players: state.players.map((player) => (player.id === target.id ? updatedTarget : player)),
    revealSequence: [...state.revealSequence, entry],
    updatedAt: Date.now(),
  };

  return evaluateReveal(next, [
    broadcast({
      type: 'card_revealed',
      card: serializeCard(card),
      source: target.name,
      source_id: target.id,
      position,
      revealed_by: actor.name,
    }),
    privately(target.id, { type: 'your_hand', hand: toPrivateHand(updatedTarget) }),
  ]);
}

function evaluateReveal(state: RoomState, deliveries: Delivery[]): RevealResult {
  const numbers = state.revealSequence.map((entry) => entry.card.number);
  const outcome = evaluateRevealSequence(numbers);

  switch (outcome) {
    case 'pending':
      return { state, deliveries: [...deliveries, broadcast(buildGameState(state))], outcome, finished: false };
    case 'continue': {
      const number = numbers[numbers.length - 1];
      return {
        state,
        deliveries: [
          ...deliveries,
          broadcast({
            type: 'reveal_match',
            number,
            count: numbers.length,
            message: `Match! (${number}) Keep revealing...`,
          }),
          broadcast(buildGameState(state)),
        ],
        outcome,
        finished: false,
      };
    }
    case 'trio':
      return completeTrio(state, deliveries);
    case 'fail': {
      const actor = requireCurrentPlayer(state);
      // The mismatched card must reach every client before anything is returned.
      return {
        state,
        deliveries: [
          ...deliveries,
          broadcast(buildGameState(state)),
          broadcast({
            type: 'turn_failed',
            player: actor.name,
            player_id: actor.id,
            message: `Different numbers! ${actor.name}'s turn ends.`,
            delay_return: true,
          }),
        ],
        outcome,
        finished: false,
      };
    }
  }
}

function completeTrio(state: RoomState, deliveries: Delivery[]): RevealResult {
  const actor = requireCurrentPlayer(state);
  const captured = state.revealSequence.slice(-3);
  const trio = captured.map((entry) => entry.card);
  const trioNumber = trio[0].number;

  const takenSlots = new Set<number>();
  const changedHands = new Set<PlayerId>();
  for (const entry of captured) {
    switch (entry.origin.kind) {
      case 'middle':
        takenSlots.add(entry.origin.slotIndex);
        break;
      case 'hand':
        changedHands.add(entry.origin.playerId);
        break;
    }
  }

  const updatedActor: Player = { ...actor, trios: [...actor.trios, trio] };
  const middle = state.middle.map((slot, index): MiddleSlot =>
    takenSlots.has(index) ? { ...slot, visibility: 'taken' } : slot,
  );
  let next: RoomState = {
    ...state,
    players: state.players.map((player) => (player.id === actor.id ? updatedActor : player)),
    middle,
    revealSequence: [],
    updatedAt: Date.now(),
  };

  const out: Delivery[] = [
    ...deliveries,
    broadcast({
      type: 'trio_complete',
      player: actor.name,
      player_id: actor.id,
      trio_number: trioNumber,
      message: `${actor.name} got a trio of ${trioNumber}s!`,
    }),
  ];
  for (const player of next.players) {
    if (changedHands.has(player.id)) {
      out.push(privately(player.id, { type: 'your_hand', hand: toPrivateHand(player) }));
    }
  }

  const win = evaluateWin(updatedActor, next.mode);
  if (win) {
    next = { ...next, phase: 'finished', winner: actor.id, winReason: win.reason };
    out.push(
      broadcast(buildGameState(next)),
      broadcast({
        type: 'game_over',
        winner: actor.name,
        winner_id: actor.id,
        reason: win.reason,
        message: `${actor.name} wins! ${win.description}`,
        final_scores: buildFinalScores(next),
      }),
    );
    return { state: next, deliveries: out, outcome: 'trio', finished: true };
  }

  out.push(
    broadcast(buildGameState(next)),
    privately(actor.id, { type: 'your_turn', message: 'Great trio! Continue your turn - find another!' }),
  );
  return { state: next, deliveries: out, outcome: 'trio', finished: false };
}

/**
 * Second half of a failed turn, run once the visible delay has elapsed: every
 * exposed card goes back where it came from and the turn passes on.
 */
export function resolveFailedTurn(state: RoomState): EngineResult {
  assertEngine(state.phase === 'playing', 'GAME_NOT_PLAYING', 'The game is not in progress');

  const faceDownSlots = new Set<number>();
  const returned = new Map<PlayerId, Card[]>();
  for (const entry of state.revealSequence) {
    switch (entry.origin.kind) {
      case 'middle':
        faceDownSlots.add(entry.origin.slotIndex);
        break;
      case 'hand': {
        const cards = returned.get(entry.origin.playerId) ?? [];
        cards.push(entry.card);
        returned.set(entry.origin.playerId, cards);
        break;
      }
    }
  }

  const reverted: RoomState = {
    ...state,
    middle: state.middle.map((slot, index): MiddleSlot =>
      faceDownSlots.has(index) ? { ...slot, visibility: 'face-down' } : slot,
    ),
    players: state.players.map((player) => {
      const cards = returned.get(player.id);
      return cards ? { ...player, hand: sortHand([...player.hand, ...cards]) } : player;
    }),
    revealSequence: [],
    updatedAt: Date.now(),
  };

  const deliveries: Delivery[] = [];
  for (const player of reverted.players) {
    if (returned.has(player.id)) {
      deliveries.push(privately(player.id, { type: 'your_hand', hand: toPrivateHand(player) }));
    }
  }
  deliveries.push(broadcast(buildGameState(reverted)));

  const advanced = advanceTurn(reverted);
  return { state: advanced.state, deliveries: [...deliveries, ...advanced.deliveries] };
}

export function advanceTurn(state: RoomState): EngineResult {
  const next: RoomState = {
    ...state,
    currentTurnIndex: (state.currentTurnIndex + 1) % state.seating.length,
    revealSequence: [],
    updatedAt: Date.now(),
  };
  const current = requireCurrentPlayer(next);

  return {
    state: next,
    deliveries: [
      broadcast({ type: 'turn_changed', current_player: current.name, current_player_id: current.id }),
      privately(current.id, { type: 'your_turn', message: YOUR_TURN_MESSAGE }),
      broadcast(buildGameState(next)),
    ],
  };
}

function requireCurrentPlayer(state: RoomState): Player {
  const current = getCurrentPlayer(state);
  if (!current) {
    throw new EngineError('GAME_NOT_PLAYING', 'No player holds the turn');
  }
  return current;
}
