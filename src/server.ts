import { createApp } from './app';
import { config } from './config/env';
import { db, pool } from './config/database';

const app = createApp();

// Database connection test with retry logic
async function testDatabaseConnection() {
  const maxRetries = 3;
  let retries = 0;

  while (retries < maxRetries) {
    try {
      await db.select('SELECT 1');
      console.log('✅ Database connection successful:', config.db.database);
      return true;
    } catch (err) {
      retries++;
      console.error(`❌ Database connection attempt ${retries}/${maxRetries} failed:`, err);

      if (retries === maxRetries) {
        console.error('❌ Max database connection retries reached');
        return false;
      }

      // Wait before retrying
      await new Promise(resolve => setTimeout(resolve, 2000));
    }
  }
  return false;
}

async function startServer() {
  try {
    console.log('🚀 Starting recipe book server...');

    const dbConnected = await testDatabaseConnection();
    if (!dbConnected) {
      console.warn('⚠️ Starting server without database connection');
    }

    app.listen(config.port, '0.0.0.0', () => {
      console.log(`🎉 Server running on port ${config.port}`);
      console.log(`📊 Environment: ${config.nodeEnv}`);
      console.log(`🗄️ Database: ${config.db.host}`);
    });
  } catch (error) {
    console.error('❌ Failed to start server:', error);
    process.exit(1);
  }
}

async function shutdown(signal: string) {
  console.log(`🛑 Received ${signal}, shutting down gracefully`);
  try {
    await pool.end();
    process.exit(0);
  } catch (error) {
    console.error('❌ Error closing database pool:', error);
    process.exit(1);
  }
}

process.on('SIGTERM', () => {
  void shutdown('SIGTERM');
});

process.on('SIGINT', () => {
  void shutdown('SIGINT');
});

void startServer();
