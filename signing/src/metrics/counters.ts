import { Logger } from '../utils/logger';

const counters = {
  auditWriteFailuresTotal: 0,
  documentsCompletedTotal: 0,
  completionRacesLostTotal: 0,
  contentCleanupFailuresTotal: 0,
};

export type CounterSnapshot = typeof counters;

export function incrementAuditWriteFailure(action: string): void {
  counters.auditWriteFailuresTotal += 1;
  Logger.warn('Metric increment', {
    metric: 'audit_write_failures_total',
    action,
    value: counters.auditWriteFailuresTotal,
  });
}

export function incrementDocumentsCompleted(documentId: string): void {
  counters.documentsCompletedTotal += 1;
  Logger.info('Metric increment', {
    metric: 'documents_completed_total',
    documentId,
    value: counters.documentsCompletedTotal,
  });
}

export function incrementCompletionRaceLost(documentId: string): void {
  counters.completionRacesLostTotal += 1;
  Logger.warn('Metric increment', {
    metric: 'completion_races_lost_total',
    documentId,
    value: counters.completionRacesLostTotal,
  });
}

export function incrementContentCleanupFailure(path: string): void {
  counters.contentCleanupFailuresTotal += 1;
  Logger.error('Metric increment', {
    metric: 'content_cleanup_failures_total',
    path,
    value: counters.contentCleanupFailuresTotal,
  });
}

export function getCounterSnapshot(): CounterSnapshot {
  return { ...counters };
}
