// Application configuration - You need to set these environment variables
export const config = {
  // Your WhatsApp phone number Id (sender)
  WA_PHONE_NUMBER_ID: process.env.WA_PHONE_NUMBER_ID || '',

  // System user access token
  CLOUD_API_ACCESS_TOKEN: process.env.CLOUD_API_ACCESS_TOKEN || '',

  // Cloud API version number
  CLOUD_API_VERSION: process.env.CLOUD_API_VERSION || 'v21.0',

  // Webhook endpoint path
  WEBHOOK_ENDPOINT: process.env.WEBHOOK_ENDPOINT || 'webhook',

  // Verification token for the GET handshake
  WEBHOOK_VERIFICATION_TOKEN: process.env.WEBHOOK_VERIFICATION_TOKEN || '',

  // Meta app secret, used to check X-Hub-Signature-256 (check disabled when empty)
  WA_APP_SECRET: process.env.WA_APP_SECRET || '',

  // Server port
  LISTENER_PORT: parseInt(process.env.LISTENER_PORT || '3000', 10),

  // Anthropic API key for card extraction
  ANTHROPIC_API_KEY: process.env.ANTHROPIC_API_KEY || '',
  AI_MODEL: process.env.AI_MODEL || 'claude-sonnet-4-20250514',

  // PostgreSQL database configuration
  DATABASE_URL: process.env.DATABASE_URL || '',
  DB_HOST: process.env.DB_HOST || 'localhost',
  DB_PORT: parseInt(process.env.DB_PORT || '5432', 10),
  DB_NAME: process.env.DB_NAME || 'card_scanner',
  DB_USER: process.env.DB_USER || 'postgres',
  DB_PASSWORD: process.env.DB_PASSWORD || '',

  // Usage limits
  DAILY_CARD_LIMIT: parseInt(process.env.DAILY_CARD_LIMIT || '50', 10),
  MAX_IMAGE_BYTES: parseInt(process.env.MAX_IMAGE_BYTES || '10485760', 10),

  // Session maintenance
  SESSION_INACTIVITY_HOURS: parseInt(process.env.SESSION_INACTIVITY_HOURS || '24', 10),
  MAINTENANCE_INTERVAL_HOURS: parseInt(process.env.MAINTENANCE_INTERVAL_HOURS || '6', 10)
};
