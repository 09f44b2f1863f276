import 'dotenv/config';

const env = {
  NODE_ENV: process.env.NODE_ENV ?? 'development',
  PORT: Number(process.env.PORT ?? 4000),
  MONGO_URI: process.env.MONGO_URI || 'mongodb://127.0.0.1:27017/?replicaSet=rs0',
  DB_NAME: process.env.DB_NAME || 'idea_board_dev',
  REDIS_URL: process.env.REDIS_URL || 'redis://127.0.0.1:6379',
  LOG_LEVEL: process.env.LOG_LEVEL || 'info',

  JWT_ACCESS_SECRET: process.env.JWT_ACCESS_SECRET || 'dev-access-secret',
  JWT_REFRESH_SECRET: process.env.JWT_REFRESH_SECRET || 'dev-refresh-secret',
  JWT_ACCESS_EXPIRES: process.env.JWT_ACCESS_EXPIRES || '15m',
  JWT_REFRESH_EXPIRES: process.env.JWT_REFRESH_EXPIRES || '7d',
  REFRESH_TTL_DAYS: Number(process.env.REFRESH_TTL_DAYS || 30),
  REFRESH_COOKIE_NAME: process.env.REFRESH_COOKIE_NAME || 'rt',

  BCRYPT_ROUNDS: Number(process.env.BCRYPT_ROUNDS || 10),
  UPLOAD_DIR: process.env.UPLOAD_DIR || 'uploads',
  JSON_BODY_LIMIT: process.env.JSON_BODY_LIMIT || '10mb',

  // bootstrap account created by ensureAdminExists() when no admin is present
  ADMIN_EMAIL: process.env.ADMIN_EMAIL || 'admin@ideas.local',
  ADMIN_PASSWORD: process.env.ADMIN_PASSWORD || 'admin123',
  ADMIN_NAME: process.env.ADMIN_NAME || 'Administrator',
};

export type Env = typeof env;

export default env;
