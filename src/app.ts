import express, { Request, Response, NextFunction } from 'express';
import cors from 'cors';
import cookieParser from 'cookie-parser';

import { config } from './config/env';
import { db } from './config/database';
import { attachUser } from './middleware/auth';
import { session } from './middleware/session';
import authRoutes from './routes/authRoutes';
import recipeRoutes from './routes/recipeRoutes';

export const createApp = () => {
  const app = express();

  app.use(cors({
    origin: function (origin, callback) {
      // Allow requests with no origin (curl, server-to-server) and any origin when no list is configured
      if (!origin || config.corsOrigins.length === 0) return callback(null, true);

      if (config.corsOrigins.includes(origin)) {
        callback(null, true);
      } else {
        console.log('❌ CORS blocked origin:', origin);
        callback(new Error('Not allowed by CORS'));
      }
    },
    credentials: true,
    methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'X-Requested-With']
  }));

  app.use(express.json({ limit: '1mb' }));
  app.use(express.urlencoded({ extended: true, limit: '1mb' }));
  app.use(cookieParser());
  app.use(session);
  app.use(attachUser);

  app.get('/health', async (req: Request, res: Response) => {
    try {
      await db.select('SELECT 1 AS health_check');
      res.json({
        status: 'healthy',
        database: 'connected',
        environment: config.nodeEnv,
        timestamp: new Date().toISOString()
      });
    } catch (error) {
      console.error('Health check failed:', error);
      res.status(500).json({
        status: 'unhealthy',
        database: 'disconnected',
        timestamp: new Date().toISOString()
      });
    }
  });

  app.use('/', authRoutes);
  app.use('/recipe', recipeRoutes);

  app.use((req: Request, res: Response) => {
    res.status(404).json({ message: 'Not found' });
  });

  // Express recognises error handlers by their four parameters
  app.use((error: unknown, req: Request, res: Response, next: NextFunction) => {
    console.error('Unhandled error:', error);
    if (res.headersSent) {
      return next(error);
    }
    res.status(500).json({ message: 'Internal server error' });
  });

  return app;
};
