/**
 * Chat platform abstraction used by the bot
 */

import { RawChatMessage } from './signal';

export type MessageHandler = (message: RawChatMessage) => Promise<void> | void;

export interface ChatSource {
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  isClientConnected(): boolean;
  onMessage(handler: MessageHandler): void;
  reply(message: RawChatMessage, text: string): Promise<void>;
}
