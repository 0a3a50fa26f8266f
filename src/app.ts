import express from 'express';
import cors from 'cors';
import { env, isLambda } from './config/env.js';
import { errorHandler, notFoundHandler } from './middleware/errorHandler.js';
import { generalLimiter } from './middleware/rateLimit.js';
import uppercaseRouter from './routes/uppercase.js';
import healthRouter from './routes/health.js';

const app = express();

// Trust proxy for correct IP behind API Gateway/load balancers
app.set('trust proxy', true);

// In Lambda mode, allow all origins since API Gateway handles CORS
app.use(cors({
  origin: isLambda ? '*' : env.CORS_ORIGIN,
  credentials: !isLambda,
}));

app.use(express.json({ limit: env.BODY_LIMIT }));

// Rate limiting - skip in Lambda (API Gateway throttles there)
if (!isLambda) {
  app.use('/api', generalLimiter);
}

// Routes
app.use('/api/uppercase', uppercaseRouter);
app.use('/api/health', healthRouter);

// Error handling
app.use(notFoundHandler);
app.use(errorHandler);

export default app;
