import type { AcademicStore, StoreTransaction } from '../persistence/AcademicStore';
import { AcademicRecordError, AcademicRecordErrors, toAcademicRecordError } from '../utils/AcademicRecordError';
import { OperationMonitor, OperationType } from '../utils/OperationMonitor';

/**
 * Base for the records services. Every public operation runs as one store
 * transaction through `transact`, which times it and collapses anything
 * thrown into the error taxonomy.
 */
export abstract class AcademicService {
  protected readonly monitor: OperationMonitor;

  constructor(protected readonly store: AcademicStore) {
    this.monitor = OperationMonitor.getInstance();
  }

  protected async transact<T>(
    type: OperationType,
    action: string,
    work: (tx: StoreTransaction) => Promise<T>,
    metadata?: Record<string, unknown>
  ): Promise<T> {
    const timer = this.monitor.startTimer();
    try {
      const result = await this.store.withTransaction(work);
      this.monitor.endTimer(timer, type, action, 'success', metadata);
      return result;
    } catch (error) {
      const surfaced = toAcademicRecordError(error);
      this.monitor.endTimer(timer, type, action, 'failure', {
        ...metadata,
        errorType: surfaced.type,
        message: surfaced.message,
        // Driver text stays in the log, never in the surfaced error
        cause: error instanceof AcademicRecordError ? undefined : describeCause(error)
      });
      throw surfaced;
    }
  }

  protected found<T>(row: T | null, resourceType: string, identifier: string | number): T {
    if (row === null) {
      throw AcademicRecordErrors.recordNotFound(resourceType, identifier);
    }
    return row;
  }
}

const describeCause = (error: unknown): string =>
  error instanceof Error ? `${error.name}: ${error.message}` : String(error);
