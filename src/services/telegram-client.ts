/**
 * Telegram client for monitoring the signal channel from a personal account
 */

import { Api, TelegramClient as TelegramApi, sessions } from 'telegram';
import { NewMessage, NewMessageEvent } from 'telegram/events';
import { ChatSource, MessageHandler, RawChatMessage, TelegramConfig } from '../types';
import { getLogger, logChatError } from '../utils/logger';

const { StringSession } = sessions;

export class TelegramClient implements ChatSource {
  private client: TelegramApi | null = null;
  private session: InstanceType<typeof StringSession>;
  private config: TelegramConfig;
  private messageHandlers: MessageHandler[] = [];
  private isConnected = false;

  constructor(config: TelegramConfig) {
    this.config = config;
    this.session = new StringSession(config.sessionString ?? '');
  }

  /**
   * Initialize and connect to Telegram
   */
  async connect(): Promise<void> {
    const logger = getLogger();

    try {
      logger.info('Initializing Telegram client...');

      this.client = new TelegramApi(this.session, this.config.apiId, this.config.apiHash, {
        connectionRetries: 5,
        retryDelay: 5000
      });

      await this.client.start({
        phoneNumber: async () => {
          // Only reached without a stored session
          throw new Error('Session string required. Run generate-session and set TELEGRAM_SESSION_STRING.');
        },
        password: async () => {
          throw new Error('Two-factor authentication not supported in automated mode.');
        },
        phoneCode: async () => {
          throw new Error('Phone code verification not supported in automated mode.');
        },
        onError: (err: Error) => {
          logChatError(err, { action: 'start' });
        }
      });

      this.isConnected = true;
      logger.info('Telegram client connected', { signalSource: this.config.signalSource });

      this.client.addEventHandler(
        (event: NewMessageEvent) => this.handleEvent(event),
        new NewMessage({ chats: [this.config.signalSource] })
      );
    } catch (error) {
      logChatError(error, { action: 'connect' });
      throw error;
    }
  }

  private async handleEvent(event: NewMessageEvent): Promise<void> {
    try {
      const message = event.message;
      const sender = await message.getSender();
      const senderUsername = sender instanceof Api.User || sender instanceof Api.Channel
        ? sender.username
        : undefined;

      const rawMessage: RawChatMessage = {
        text: message.message ?? '',
        chatId: message.chatId?.toString() ?? this.config.signalSource,
        messageId: message.id,
        date: new Date(message.date * 1000),
        senderId: message.senderId?.toString(),
        senderUsername
      };

      getLogger().debug('Received Telegram message', {
        chatId: rawMessage.chatId,
        senderUsername,
        preview: rawMessage.text.substring(0, 100)
      });

      for (const handler of this.messageHandlers) {
        try {
          await handler(rawMessage);
        } catch (error) {
          logChatError(error, {
            action: 'message_handler',
            messageId: rawMessage.messageId
          });
        }
      }
    } catch (error) {
      logChatError(error, { action: 'message_event' });
    }
  }

  /**
   * Register a message handler
   */
  onMessage(handler: MessageHandler): void {
    this.messageHandlers.push(handler);
  }

  /**
   * Reply in the signal channel, threaded under the original message
   */
  async reply(message: RawChatMessage, text: string): Promise<void> {
    if (!this.client) {
      throw new Error('Telegram client not connected');
    }

    try {
      await this.client.sendMessage(this.config.signalSource, {
        message: text,
        replyTo: message.messageId
      });
    } catch (error) {
      logChatError(error, { action: 'reply', messageId: message.messageId });
      throw error;
    }
  }

  /**
   * Check connection status
   */
  isClientConnected(): boolean {
    return this.isConnected && this.client !== null;
  }

  /**
   * Disconnect from Telegram
   */
  async disconnect(): Promise<void> {
    if (this.client) {
      try {
        await this.client.disconnect();
        this.isConnected = false;
        getLogger().info('Telegram client disconnected');
      } catch (error) {
        logChatError(error, { action: 'disconnect' });
      }
    }
  }
}
