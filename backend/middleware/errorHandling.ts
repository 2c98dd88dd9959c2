import type { NextFunction, Request, RequestHandler, Response } from 'express';
import AcademicRecordErrorHandler, { AcademicRecordError, AcademicRecordErrors } from '../utils/AcademicRecordError';
import OperationMonitor, { OperationType } from '../utils/OperationMonitor';
import { toFields } from '../utils/validators';

const errorHandler = AcademicRecordErrorHandler.getInstance();
const monitor = OperationMonitor.getInstance();

/**
 * Route an async controller's rejection to the error middleware
 */
export const asyncHandler =
  (handler: (req: Request, res: Response) => Promise<void>): RequestHandler =>
  (req, res, next) => {
    handler(req, res).catch(next);
  };

/**
 * Error handling middleware with monitoring integration
 */
export const errorMiddleware = (error: unknown, req: Request, res: Response, next: NextFunction): void => {
  const operationId = monitor.startTimer();

  try {
    errorHandler.errorMiddleware(error, req, res, next);

    monitor.endTimer(operationId, OperationType.QUERY, 'Error handling', 'success', {
      method: req.method,
      url: req.originalUrl,
      errorType: error instanceof AcademicRecordError ? error.type : 'UNKNOWN'
    });
  } catch (handlingError) {
    console.error('Error in error handling middleware:', handlingError);

    monitor.endTimer(operationId, OperationType.QUERY, 'Error handling', 'failure', {
      handlingError: handlingError instanceof Error ? handlingError.message : String(handlingError)
    });

    if (!res.headersSent) {
      res.status(500).json({
        error: {
          type: 'SYSTEM_ERROR',
          message: 'An unexpected error occurred',
          userFriendlyMessage: 'We\'re experiencing technical difficulties. Please try again later.',
          timestamp: new Date().toISOString()
        }
      });
    }
  }
};

export const notFoundHandler = (req: Request, _res: Response, next: NextFunction): void => {
  next(AcademicRecordErrors.recordNotFound('Route', `${req.method} ${req.path}`));
};

/**
 * Operation and error statistics for the last `hours` hours
 */
export const getMonitoringDashboard = asyncHandler(async (req, res) => {
  const query = toFields(req.query);
  const hours = query.hours === undefined ? 24 : Number(query.hours);
  if (!Number.isFinite(hours) || hours <= 0) {
    throw AcademicRecordErrors.incorrectValue('hours', query.hours);
  }

  const operations = monitor.getStatistics(hours);
  const errors = errorHandler.getErrorStatistics(hours);

  res.json({
    timeframe: `${hours} hours`,
    operations,
    errors,
    summary: {
      totalEvents: operations.totalEvents,
      errorRate: operations.totalEvents > 0 ? `${((errors.total / operations.totalEvents) * 100).toFixed(2)}%` : '0%'
    }
  });
});
