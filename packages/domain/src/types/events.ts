import type { GameMode, RoomSummary, WinReason } from './game.js';
import type { HandPosition, PlayerId, PrivateHandView, PublicPlayerView, SerializedCard } from './player.js';

export interface ErrorMessage {
  type: 'error';
  code: string;
  message: string;
}

export interface WelcomeMessage {
  type: 'welcome';
  player_id: PlayerId;
  room: RoomSummary;
}

export interface PlayerJoinedMessage {
  type: 'player_joined';
  player: PublicPlayerView;
  room: RoomSummary;
}

export interface PlayerDisconnectedMessage {
  type: 'player_disconnected';
  player_id: PlayerId;
  player_name: string;
  room: RoomSummary;
}

export interface ModeChangedMessage {
  type: 'mode_changed';
  mode: GameMode;
  room: RoomSummary;
}

export interface GameStartedMessage {
  type: 'game_started';
  mode: GameMode;
  turn_order: string[];
  current_player: string | null;
  current_player_id: PlayerId | null;
  middle_card_count: number;
  room: RoomSummary;
}

export interface YourHandMessage {
  type: 'your_hand';
  hand: PrivateHandView;
}

export interface YourTurnMessage {
  type: 'your_turn';
  message: string;
}

export interface MiddleSlotView {
  id: number;
  number: number | null;
  face_up: boolean;
  taken: boolean;
}

export interface RevealedCardView {
  card: SerializedCard;
  source: string;
  source_id: PlayerId | null;
  position: HandPosition | null;
}

export interface GameStateMessage {
  type: 'game_state';
  players: PublicPlayerView[];
  middle_cards: MiddleSlotView[];
  middle_card_count: number;
  revealed_this_turn: RevealedCardView[];
  current_player: string | null;
  current_player_id: PlayerId | null;
}

export interface CardRevealedMessage {
  type: 'card_revealed';
  card: SerializedCard;
  source: string;
  source_id: PlayerId | null;
  position: HandPosition | null;
  revealed_by: string;
}

export interface RevealMatchMessage {
  type: 'reveal_match';
  number: number;
  count: number;
  message: string;
}

export interface TurnFailedMessage {
  type: 'turn_failed';
  player: string;
  player_id: PlayerId;
  message: string;
  delay_return: boolean;
}

export interface TrioCompleteMessage {
  type: 'trio_complete';
  player: string;
  player_id: PlayerId;
  trio_number: number;
  message: string;
}

export interface FinalScore {
  player_id: PlayerId;
  name: string;
  trios: number;
}

export interface GameOverMessage {
  type: 'game_over';
  winner: string;
  winner_id: PlayerId;
  reason: WinReason;
  message: string;
  final_scores: FinalScore[];
}

export interface TurnChangedMessage {
  type: 'turn_changed';
  current_player: string;
  current_player_id: PlayerId;
}

export interface ChatMessage {
  type: 'chat';
  player: string;
  player_id: PlayerId;
  message: string;
}

export type ServerMessage =
  | ErrorMessage
  | WelcomeMessage
  | PlayerJoinedMessage
  | PlayerDisconnectedMessage
  | ModeChangedMessage
  | GameStartedMessage
  | YourHandMessage
  | YourTurnMessage
  | GameStateMessage
  | CardRevealedMessage
  | RevealMatchMessage
  | TurnFailedMessage
  | TrioCompleteMessage
  | GameOverMessage
  | TurnChangedMessage
  | ChatMessage;

export type ServerMessageType = ServerMessage['type'];
