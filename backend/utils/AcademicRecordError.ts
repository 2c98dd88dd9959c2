import { randomUUID } from 'crypto';
import type { Request, Response, NextFunction } from 'express';
import { loadEnvironment, shouldLog, type LogLevel } from '../config/environment';
import { ConstraintViolationError } from '../persistence/constraints';

/**
 * Error kinds surfaced to callers of the records services
 */
export enum AcademicErrorType {
  RECORD_NOT_FOUND = 'RECORD_NOT_FOUND',
  DUPLICATE_ENROLLMENT = 'DUPLICATE_ENROLLMENT',
  CAPACITY_EXCEEDED = 'CAPACITY_EXCEEDED',
  PREREQUISITE_NOT_MET = 'PREREQUISITE_NOT_MET',
  INVALID_EMAIL = 'INVALID_EMAIL',
  UNSUPPORTED_DATE_FORMAT = 'UNSUPPORTED_DATE_FORMAT',
  INCORRECT_TIMESLOT = 'INCORRECT_TIMESLOT',
  INCORRECT_VALUE = 'INCORRECT_VALUE',
  DATABASE_ERROR = 'DATABASE_ERROR'
}

const DEFAULT_STATUS: Record<AcademicErrorType, number> = {
  [AcademicErrorType.RECORD_NOT_FOUND]: 404,
  [AcademicErrorType.DUPLICATE_ENROLLMENT]: 409,
  [AcademicErrorType.CAPACITY_EXCEEDED]: 409,
  [AcademicErrorType.PREREQUISITE_NOT_MET]: 422,
  [AcademicErrorType.INVALID_EMAIL]: 400,
  [AcademicErrorType.UNSUPPORTED_DATE_FORMAT]: 400,
  [AcademicErrorType.INCORRECT_TIMESLOT]: 400,
  [AcademicErrorType.INCORRECT_VALUE]: 400,
  [AcademicErrorType.DATABASE_ERROR]: 500
};

const USER_MESSAGES: Record<AcademicErrorType, string> = {
  [AcademicErrorType.RECORD_NOT_FOUND]: 'The requested record does not exist.',
  [AcademicErrorType.DUPLICATE_ENROLLMENT]: 'The student is already enrolled in this section.',
  [AcademicErrorType.CAPACITY_EXCEEDED]: 'This section has no open seats.',
  [AcademicErrorType.PREREQUISITE_NOT_MET]: 'The student has not passed every prerequisite for this course.',
  [AcademicErrorType.INVALID_EMAIL]: 'Enter an email address such as name@university.edu.',
  [AcademicErrorType.UNSUPPORTED_DATE_FORMAT]: 'Dates must be written as YYYY-MM-DD.',
  [AcademicErrorType.INCORRECT_TIMESLOT]: 'Time slots must look like "TTh 14:00-15:15".',
  [AcademicErrorType.INCORRECT_VALUE]: 'One of the submitted values is not allowed.',
  [AcademicErrorType.DATABASE_ERROR]: 'The records store rejected the change.'
};

export interface AcademicErrorContext {
  resourceType?: string;
  resourceId?: string;
  userFriendlyMessage?: string;
  requestId?: string;
}

export class AcademicRecordError extends Error {
  public readonly type: AcademicErrorType;
  public readonly statusCode: number;
  public readonly resourceType?: string;
  public readonly resourceId?: string;
  public readonly userFriendlyMessage: string;
  public readonly timestamp: Date;
  public readonly requestId?: string;

  constructor(
    type: AcademicErrorType,
    message: string,
    statusCode: number = DEFAULT_STATUS[type],
    context?: AcademicErrorContext
  ) {
    super(message);
    this.name = 'AcademicRecordError';
    this.type = type;
    this.statusCode = statusCode;
    this.resourceType = context?.resourceType;
    this.resourceId = context?.resourceId;
    this.userFriendlyMessage = context?.userFriendlyMessage ?? USER_MESSAGES[type];
    this.timestamp = new Date();
    this.requestId = context?.requestId;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, AcademicRecordError);
    }
  }

  toJSON() {
    return {
      error: {
        type: this.type,
        message: this.message,
        userFriendlyMessage: this.userFriendlyMessage,
        timestamp: this.timestamp.toISOString(),
        requestId: this.requestId
      },
      context: {
        resourceType: this.resourceType,
        resourceId: this.resourceId
      }
    };
  }
}

const formatValue = (value: unknown): string =>
  typeof value === 'string' ? value : JSON.stringify(value) ?? String(value);

/**
 * Factory functions for the error taxonomy
 */
export const AcademicRecordErrors = {
  recordNotFound: (resourceType: string, identifier: string | number) =>
    new AcademicRecordError(
      AcademicErrorType.RECORD_NOT_FOUND,
      `${resourceType} with identifier '${identifier}' not found`,
      undefined,
      { resourceType, resourceId: String(identifier) }
    ),

  duplicateEnrollment: (studentId: number, section: string) =>
    new AcademicRecordError(
      AcademicErrorType.DUPLICATE_ENROLLMENT,
      `Student ${studentId} is already enrolled in section ${section}`,
      undefined,
      { resourceType: 'Takes', resourceId: `${studentId}-${section}` }
    ),

  capacityExceeded: (section: string, capacity: number) =>
    new AcademicRecordError(
      AcademicErrorType.CAPACITY_EXCEEDED,
      `Section ${section} is full (capacity ${capacity})`,
      undefined,
      { resourceType: 'Section', resourceId: section }
    ),

  prerequisiteNotMet: (courseId: string, missing: string[]) =>
    new AcademicRecordError(
      AcademicErrorType.PREREQUISITE_NOT_MET,
      `Course ${courseId} requires a passing grade in: ${missing.join(', ')}`,
      undefined,
      { resourceType: 'Course', resourceId: courseId }
    ),

  invalidEmail: (value: unknown) =>
    new AcademicRecordError(
      AcademicErrorType.INVALID_EMAIL,
      `'${formatValue(value)}' is not a valid email address`
    ),

  unsupportedDateFormat: (value: unknown) =>
    new AcademicRecordError(
      AcademicErrorType.UNSUPPORTED_DATE_FORMAT,
      `Date '${formatValue(value)}' is not in YYYY-MM-DD format or is not a calendar date`
    ),

  incorrectTimeslot: (value: unknown) =>
    new AcademicRecordError(
      AcademicErrorType.INCORRECT_TIMESLOT,
      `Time slot '${formatValue(value)}' is not valid, expected a value such as 'TTh 14:00-15:15'`
    ),

  incorrectValue: (field: string, value: unknown) =>
    new AcademicRecordError(
      AcademicErrorType.INCORRECT_VALUE,
      `The value '${formatValue(value)}' for field '${field}' is not valid`,
      undefined,
      { resourceType: field }
    ),

  databaseError: (message: string, statusCode: number = 500) =>
    new AcademicRecordError(AcademicErrorType.DATABASE_ERROR, message, statusCode)
};

/**
 * Collapse anything thrown inside a service call into the taxonomy.
 * Store constraint violations keep their constraint name; driver messages do not leak.
 */
export const toAcademicRecordError = (error: unknown): AcademicRecordError => {
  if (error instanceof AcademicRecordError) {
    return error;
  }
  if (error instanceof ConstraintViolationError) {
    return AcademicRecordErrors.databaseError(
      `${error.kind} constraint '${error.constraint}' violated on ${error.table}`,
      409
    );
  }
  return AcademicRecordErrors.databaseError('The records store failed to complete the operation');
};

interface ErrorLogEntry {
  error: AcademicRecordError;
  method?: string;
  url?: string;
  timestamp: Date;
}

/**
 * Keeps a bounded log of surfaced errors and renders them over HTTP
 */
export class AcademicRecordErrorHandler {
  private static instance: AcademicRecordErrorHandler;
  private errorLog: ErrorLogEntry[] = [];
  private readonly logLevel: LogLevel;

  private constructor() {
    this.logLevel = loadEnvironment().LOG_LEVEL;
  }

  public static getInstance(): AcademicRecordErrorHandler {
    if (!AcademicRecordErrorHandler.instance) {
      AcademicRecordErrorHandler.instance = new AcademicRecordErrorHandler();
    }
    return AcademicRecordErrorHandler.instance;
  }

  /**
   * Express error handling middleware
   */
  public errorMiddleware = (
    error: unknown,
    req: Request,
    res: Response,
    _next: NextFunction
  ): void => {
    const requestId = randomUUID();

    if (error instanceof AcademicRecordError) {
      this.logError(error, req);
      const body = error.toJSON();
      body.error.requestId = body.error.requestId ?? requestId;
      res.status(error.statusCode).json(body);
      return;
    }

    if (isMalformedBody(error)) {
      const malformed = new AcademicRecordError(
        AcademicErrorType.INCORRECT_VALUE,
        'Request body is not valid JSON',
        400,
        { requestId, resourceType: 'body' }
      );
      this.logError(malformed, req);
      res.status(400).json(malformed.toJSON());
      return;
    }

    if (shouldLog(this.logLevel, 'error')) {
      console.error('🚨 Unhandled records error:', {
        message: error instanceof Error ? error.message : String(error),
        stack: error instanceof Error ? error.stack : undefined,
        url: req.url,
        method: req.method,
        requestId
      });
    }

    res.status(500).json({
      error: {
        type: 'SYSTEM_ERROR',
        message: 'An unexpected error occurred',
        userFriendlyMessage: 'We\'re experiencing technical difficulties. Please try again later.',
        timestamp: new Date().toISOString(),
        requestId
      }
    });
  };

  public logError(error: AcademicRecordError, req?: Request): void {
    this.errorLog.push({
      error,
      method: req?.method,
      url: req?.url,
      timestamp: new Date()
    });

    if (this.errorLog.length > 1000) {
      this.errorLog = this.errorLog.slice(-1000);
    }

    if (shouldLog(this.logLevel, error.statusCode >= 500 ? 'error' : 'warn')) {
      console.warn('⚠️ Records error:', {
        type: error.type,
        message: error.message,
        resourceType: error.resourceType,
        resourceId: error.resourceId,
        statusCode: error.statusCode,
        url: req?.url,
        method: req?.method
      });
    }
  }

  public getErrorStatistics(hours: number = 24): {
    total: number;
    byType: Record<string, number>;
    byStatusCode: Record<string, number>;
  } {
    const cutoff = new Date(Date.now() - hours * 60 * 60 * 1000);
    const recent = this.errorLog.filter(entry => entry.timestamp >= cutoff);

    const byType: Record<string, number> = {};
    const byStatusCode: Record<string, number> = {};
    for (const entry of recent) {
      byType[entry.error.type] = (byType[entry.error.type] ?? 0) + 1;
      const status = entry.error.statusCode.toString();
      byStatusCode[status] = (byStatusCode[status] ?? 0) + 1;
    }

    return { total: recent.length, byType, byStatusCode };
  }

  public clearErrorLog(): void {
    this.errorLog = [];
  }
}

// body-parser marks JSON syntax errors with this type
const isMalformedBody = (error: unknown): boolean =>
  typeof error === 'object' &&
  error !== null &&
  'type' in error &&
  error.type === 'entity.parse.failed';

export default AcademicRecordErrorHandler;
