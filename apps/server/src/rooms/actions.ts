import { type CardId, type GameMode, GAME_MODES, type PlayerId } from '@trio/domain';

export type ClientAction =
  | { action: 'set_mode'; mode: GameMode }
  | { action: 'start_game' }
  | { action: 'reveal_middle'; cardId: CardId }
  | { action: 'reveal_player'; targetPlayerId: PlayerId; position: string }
  | { action: 'chat'; message: string };

export type ClientActionName = ClientAction['action'];

export const CLIENT_ACTIONS: readonly ClientActionName[] = [
  'set_mode',
  'start_game',
  'reveal_middle',
  'reveal_player',
  'chat',
];

export function isClientActionName(value: unknown): value is ClientActionName {
  return CLIENT_ACTIONS.some((name) => name === value);
}

export type ParsedAction = { ok: true; value: ClientAction } | { ok: false; message: string };

/** Inbound payloads use snake_case field names (`card_id`, `target_player_id`). */
export function parseClientAction(payload: unknown): ParsedAction {
  if (!isRecord(payload)) {
    return invalid('Payload must be an object');
  }

  const action = payload.action;
  switch (action) {
    case 'set_mode': {
      const mode = parseGameMode(payload.mode);
      if (!mode) {
        return invalid("mode must be 'simple' or 'spicy'");
      }
      return { ok: true, value: { action: 'set_mode', mode } };
    }
    case 'start_game':
      return { ok: true, value: { action: 'start_game' } };
    case 'reveal_middle': {
      const cardId = payload.card_id;
      if (typeof cardId !== 'number' || !Number.isInteger(cardId)) {
        return invalid('card_id must be an integer');
      }
      return { ok: true, value: { action: 'reveal_middle', cardId } };
    }
    case 'reveal_player': {
      const targetPlayerId = optionalString(payload.target_player_id);
      const position = optionalString(payload.position);
      if (!targetPlayerId || !position) {
        return invalid('target_player_id and position are required');
      }
      return { ok: true, value: { action: 'reveal_player', targetPlayerId, position } };
    }
    case 'chat': {
      const message = payload.message;
      if (typeof message !== 'string') {
        return invalid('message must be a string');
      }
      return { ok: true, value: { action: 'chat', message } };
    }
    default:
      return invalid(typeof action === 'string' ? `Unknown action '${action}'` : 'action is required');
  }
}

function invalid(message: string): ParsedAction {
  return { ok: false, message };
}

/** Case-insensitive; undefined for anything that is not a known mode. */
export function parseGameMode(value: unknown): GameMode | undefined {
  const normalized = typeof value === 'string' ? value.trim().toLowerCase() : undefined;
  return GAME_MODES.find((mode) => mode === normalized);
}

function optionalString(value: unknown): string | undefined {
  if (typeof value !== 'string') {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}
