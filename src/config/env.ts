import dotenv from 'dotenv';
dotenv.config();

const toNumber = (value: string | undefined, fallback: number): number => {
  const parsed = Number(value);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
};

export const config = {
  port: toNumber(process.env.PORT, 3000),
  nodeEnv: process.env.NODE_ENV || 'development',

  db: {
    host: process.env.DB_HOST || 'localhost',
    port: toNumber(process.env.DB_PORT, 3306),
    user: process.env.DB_USER || 'root',
    password: process.env.DB_PASSWORD || '',
    database: process.env.DB_NAME || 'recipe_book',
    ssl: process.env.DB_SSL === 'true'
  },

  jwt: {
    secret: process.env.JWT_SECRET || 'change-me',
    // seconds
    expiresIn: toNumber(process.env.JWT_EXPIRES_IN, 24 * 60 * 60)
  },

  // Empty list means any origin is accepted
  corsOrigins: (process.env.CORS_ORIGINS || '')
    .split(',')
    .map(origin => origin.trim())
    .filter(origin => origin.length > 0),

  itemsPerPage: toNumber(process.env.ITEMS_PER_PAGE, 10),
  topRatedLimit: toNumber(process.env.TOP_RATED_LIMIT, 10)
};
