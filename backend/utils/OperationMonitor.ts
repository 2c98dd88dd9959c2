import { randomUUID } from 'crypto';
import { loadEnvironment, shouldLog, type LogLevel } from '../config/environment';

/**
 * Operation categories recorded by the monitor
 */
export enum OperationType {
  CATALOG_CHANGE = 'CATALOG_CHANGE',
  PEOPLE_CHANGE = 'PEOPLE_CHANGE',
  ENROLLMENT = 'ENROLLMENT',
  GRADING = 'GRADING',
  ADVISING = 'ADVISING',
  REPORT = 'REPORT',
  QUERY = 'QUERY'
}

export type OperationResult = 'success' | 'failure' | 'warning';

export interface MonitoringEvent {
  id: string;
  type: OperationType;
  action: string;
  result: OperationResult;
  timestamp: Date;
  duration?: number;
  metadata?: Record<string, unknown>;
}

interface ActionMetrics {
  count: number;
  failures: number;
  totalDuration: number;
}

/**
 * Records service operations, times them and warns about slow ones
 */
export class OperationMonitor {
  private static instance: OperationMonitor;
  private events: MonitoringEvent[] = [];
  private operationTimers: Map<string, number> = new Map();
  private metrics: Map<string, ActionMetrics> = new Map();
  private readonly logLevel: LogLevel;
  private readonly slowOperationMs: number;

  private constructor() {
    const environment = loadEnvironment();
    this.logLevel = environment.LOG_LEVEL;
    this.slowOperationMs = environment.SLOW_OPERATION_MS;
  }

  public static getInstance(): OperationMonitor {
    if (!OperationMonitor.instance) {
      OperationMonitor.instance = new OperationMonitor();
    }
    return OperationMonitor.instance;
  }

  /**
   * Start timing an operation, returning the id `endTimer` expects
   */
  public startTimer(): string {
    const operationId = randomUUID();
    this.operationTimers.set(operationId, Date.now());
    return operationId;
  }

  public endTimer(
    operationId: string,
    type: OperationType,
    action: string,
    result: OperationResult,
    metadata?: Record<string, unknown>
  ): MonitoringEvent {
    const startTime = this.operationTimers.get(operationId);
    const duration = startTime === undefined ? undefined : Date.now() - startTime;
    this.operationTimers.delete(operationId);

    const event = this.logOperation(type, action, result, metadata, duration);

    if (duration !== undefined && duration > this.slowOperationMs) {
      this.logPerformanceIssue(action, duration);
    }

    return event;
  }

  public logOperation(
    type: OperationType,
    action: string,
    result: OperationResult,
    metadata?: Record<string, unknown>,
    duration?: number
  ): MonitoringEvent {
    const event: MonitoringEvent = {
      id: randomUUID(),
      type,
      action,
      result,
      timestamp: new Date(),
      duration,
      metadata
    };

    this.events.push(event);

    // Keep only last 10000 events in memory
    if (this.events.length > 10000) {
      this.events = this.events.slice(-10000);
    }

    const current = this.metrics.get(action) ?? { count: 0, failures: 0, totalDuration: 0 };
    this.metrics.set(action, {
      count: current.count + 1,
      failures: current.failures + (result === 'failure' ? 1 : 0),
      totalDuration: current.totalDuration + (duration ?? 0)
    });

    this.logToConsole(event);
    return event;
  }

  public logPerformanceIssue(action: string, duration: number): void {
    if (!shouldLog(this.logLevel, 'warn')) return;
    console.warn(`⚠️ SLOW OPERATION: ${action} took ${duration}ms (threshold: ${this.slowOperationMs}ms)`);
  }

  public getStatistics(hours: number = 24): {
    totalEvents: number;
    byType: Record<string, number>;
    byResult: Record<OperationResult, number>;
    averageDurationByAction: Record<string, number>;
  } {
    const cutoff = new Date(Date.now() - hours * 60 * 60 * 1000);
    const recent = this.events.filter(event => event.timestamp >= cutoff);

    const byType: Record<string, number> = {};
    const byResult: Record<OperationResult, number> = { success: 0, failure: 0, warning: 0 };
    for (const event of recent) {
      byType[event.type] = (byType[event.type] ?? 0) + 1;
      byResult[event.result] += 1;
    }

    const averageDurationByAction: Record<string, number> = {};
    for (const [action, metrics] of this.metrics) {
      averageDurationByAction[action] = metrics.count === 0 ? 0 : metrics.totalDuration / metrics.count;
    }

    return { totalEvents: recent.length, byType, byResult, averageDurationByAction };
  }

  public getRecentEvents(limit: number = 50): MonitoringEvent[] {
    return this.events.slice(-limit);
  }

  public clearAll(): void {
    this.events = [];
    this.operationTimers.clear();
    this.metrics.clear();
  }

  private logToConsole(event: MonitoringEvent): void {
    if (event.result === 'failure') {
      if (!shouldLog(this.logLevel, 'warn')) return;
      console.warn(`❌ ${event.type}: ${event.action} failed`, {
        duration: event.duration,
        ...event.metadata
      });
      return;
    }

    if (!shouldLog(this.logLevel, 'info')) return;
    const emoji = event.result === 'warning' ? '⚠️' : '✅';
    const timing = event.duration === undefined ? '' : ` (${event.duration}ms)`;
    console.log(`${emoji} ${event.type}: ${event.action}${timing}`);
  }
}

export default OperationMonitor;
