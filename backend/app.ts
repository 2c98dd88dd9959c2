import express, { type Express } from 'express';
import cors from 'cors';
import rateLimit from 'express-rate-limit';
import helmet from 'helmet';
import { loadEnvironment, type Environment } from './config/environment';
import { errorMiddleware, notFoundHandler } from './middleware/errorHandling';
import type { AcademicStore } from './persistence/AcademicStore';
import advisorRoutes from './routes/advisors';
import courseRoutes from './routes/courses';
import departmentRoutes from './routes/departments';
import enrollmentRoutes from './routes/enrollments';
import instructorRoutes from './routes/instructors';
import monitoringRoutes from './routes/monitoring';
import sectionRoutes from './routes/sections';
import studentRoutes from './routes/students';
import { createServices, type ServiceOptions } from './services';

export interface AppOptions extends ServiceOptions {
  environment?: Environment;
}

/**
 * Build the HTTP surface over a store. The caller owns the store's lifecycle.
 */
export const createApp = (store: AcademicStore, options: AppOptions = {}): Express => {
  const environment = options.environment ?? loadEnvironment();
  const services = createServices(store, { clock: options.clock });
  const app = express();

  // Security middleware
  app.use(helmet());

  app.use(rateLimit({
    windowMs: 15 * 60 * 1000,
    limit: environment.RATE_LIMIT_MAX,
    standardHeaders: 'draft-7',
    legacyHeaders: false,
    message: 'Too many requests from this IP, please try again later.'
  }));

  app.use(cors({
    origin: environment.CORS_ORIGIN,
    credentials: true
  }));

  app.use(express.json({ limit: '1mb' }));

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', store: environment.STORE_DRIVER, timestamp: new Date().toISOString() });
  });

  // Routes
  app.use('/api/departments', departmentRoutes(services));
  app.use('/api/students', studentRoutes(services));
  app.use('/api/instructors', instructorRoutes(services));
  app.use('/api/courses', courseRoutes(services));
  app.use('/api/sections', sectionRoutes(services));
  app.use('/api/enrollments', enrollmentRoutes(services));
  app.use('/api/advisors', advisorRoutes(services));
  app.use('/api/monitoring', monitoringRoutes());

  app.use(notFoundHandler);
  app.use(errorMiddleware);

  return app;
};
