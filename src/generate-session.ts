/**
 * Script to generate Telegram session string for first-time authentication
 */

import * as dotenv from 'dotenv';
import * as input from 'input';
import { TelegramClient, sessions } from 'telegram';

const { StringSession } = sessions;

// Load environment variables
dotenv.config();

async function generateSession(): Promise<void> {
  console.log('📱 Telegram Session Generator');
  console.log('============================\n');

  const apiId = process.env.TELEGRAM_API_ID;
  const apiHash = process.env.TELEGRAM_API_HASH;

  if (!apiId || !apiHash) {
    console.error('❌ Missing required environment variables!');
    console.error('\nPlease ensure your .env file contains:');
    console.error('TELEGRAM_API_ID=your_api_id');
    console.error('TELEGRAM_API_HASH=your_api_hash');
    process.exit(1);
  }

  const session = new StringSession('');
  const client = new TelegramClient(session, Number(apiId), apiHash, {
    connectionRetries: 5
  });

  console.log('🔄 Connecting to Telegram...\n');

  await client.start({
    phoneNumber: () => input.text('📞 Phone number (with country code): '),
    password: async () => (await input.password('🔐 2FA password (press Enter if none): ')) || '',
    phoneCode: () => input.text('💬 Verification code: '),
    onError: (err: Error) => {
      console.error('❌ Error:', err.message);
    }
  });

  console.log('\n✅ Successfully authenticated!\n');
  console.log('📋 Add this to your .env file:\n');
  console.log(`TELEGRAM_SESSION_STRING=${session.save()}`);
  console.log('\n⚠️  Keep this string secure - it provides access to your Telegram account!');

  await client.disconnect();
}

generateSession().catch(error => {
  console.error('\n❌ Failed to generate session:', error);
  process.exit(1);
});
