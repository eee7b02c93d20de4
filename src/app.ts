import express, { Express } from 'express';
import mongoose from 'mongoose';
import helmet from 'helmet';
import cors from 'cors';
import mongoSanitize from 'express-mongo-sanitize';
import compression from 'compression';
import cookieParser from 'cookie-parser';
import hpp from 'hpp';
import { errorHandler, notFoundHandler } from './middleware/error.middleware';
import { requestLogger } from './middleware/logger.middleware';
import { generalLimiter } from './middleware/rateLimit.middleware';
import { setupSwagger } from './config/swagger';
import { getEmailTransporter } from './config/email';
import v1Routes from './routes/v1';

const app: Express = express();

// Security middleware
app.use(helmet());
app.use(
  cors({
    origin: process.env.CORS_ORIGIN || 'http://localhost:3000',
    credentials: true,
    exposedHeaders: ['Content-Disposition', 'X-Export-Errors'],
  })
);
app.use(mongoSanitize());
app.use(hpp());

// Body parsing middleware
app.use(express.json({ limit: '1mb' }));
app.use(express.urlencoded({ extended: true, limit: '1mb' }));
app.use(cookieParser());

// Compression middleware
app.use(compression());

// Request logging
if (process.env.NODE_ENV !== 'test') {
  app.use(requestLogger);
}

// Rate limiting
app.use('/api', generalLimiter);

const DATABASE_STATES: Record<number, string> = {
  0: 'disconnected',
  1: 'connected',
  2: 'connecting',
  3: 'disconnecting',
};

// Health check endpoint
app.get('/health', (_req, res) => {
  res.status(200).json({
    success: true,
    message: 'Server is healthy',
    timestamp: new Date().toISOString(),
    uptime: process.uptime(),
    database: DATABASE_STATES[mongoose.connection.readyState] ?? 'unknown',
    email: getEmailTransporter() ? 'configured' : 'not configured',
  });
});

// API version info
app.get('/api/v1', (_req, res) => {
  res.status(200).json({
    success: true,
    message: 'Placement Portal API v1',
    documentation: '/docs',
    resources: ['auth', 'students', 'companies', 'applications', 'imports', 'exports', 'reports'],
  });
});

// Swagger documentation
setupSwagger(app);

// API routes
app.use('/api/v1', v1Routes);

// Error handling
app.use(notFoundHandler);
app.use(errorHandler);

export default app;
