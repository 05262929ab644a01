import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import db from './config/sqlite';
import { gamificationRules } from './config/gamification';
import { getErrorCode, getErrorMessage, handleDatabaseError, isDatabaseError } from './utils/dbErrorHandler';
// Import routes
import authRoutes from './routes/authRoutes';
import userRoutes from './routes/userRoutes';
import complaintRoutes from './routes/complaintRoutes';
import adminRoutes from './routes/adminRoutes';

const app = express();

app.use(helmet());
app.use(cors());
app.use(express.json({ limit: '1mb' }));
app.use(express.urlencoded({ extended: true, limit: '1mb' }));

// API Routes
app.use('/api/v1/auth', authRoutes);
app.use('/api/v1/users', userRoutes);
app.use('/api/v1/complaints', complaintRoutes);
app.use('/api/v1/admin', adminRoutes);

app.get('/', (req, res) => {
  res.json({
    message: 'Welcome to Civic Eye API',
    service: 'civic-eye-api',
    version: 'v1',
    status: 'ok',
    endpoints: {
      api: '/api/v1',
      health: '/health'
    }
  });
});

app.get('/api/v1', (req, res) => {
  res.json({
    status: 'ok',
    service: 'civic-eye-api',
    version: 'v1',
    routes: [
      '/api/v1/auth',
      '/api/v1/users',
      '/api/v1/complaints',
      '/api/v1/admin'
    ],
    rules: gamificationRules
  });
});

// Health check
app.get('/health', (req, res) => {
  try {
    db.prepare('SELECT 1').get();
    res.json({
      status: 'ok',
      service: 'civic-eye-api',
      database: 'connected (SQLite)'
    });
  } catch (error) {
    console.error('Health check failed:', getErrorMessage(error));
    res.status(503).json({
      status: 'error',
      service: 'civic-eye-api',
      error: 'Service unavailable'
    });
  }
});

// Global error handler middleware - must be after all routes
app.use((err: unknown, req: express.Request, res: express.Response, next: express.NextFunction) => {
  console.error('Unhandled error:', err);

  if (res.headersSent) {
    return next(err);
  }

  if (isDatabaseError(err)) {
    const handled = handleDatabaseError(err);
    return res.status(handled.status).json({ error: handled.error });
  }

  // Malformed JSON bodies from express.json()
  if (err instanceof SyntaxError) {
    return res.status(400).json({
      error: { code: 'INVALID_JSON', message: 'Request body is not valid JSON' }
    });
  }

  res.status(500).json({
    error: {
      code: getErrorCode(err) || 'INTERNAL_ERROR',
      message: getErrorMessage(err) || 'An unexpected error occurred',
    }
  });
});

// 404 handler - must be after all routes and error handler
app.use((req: express.Request, res: express.Response) => {
  res.status(404).json({
    error: {
      code: 'NOT_FOUND',
      message: `Route ${req.method} ${req.path} not found`,
    }
  });
});

export default app;
