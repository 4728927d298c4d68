import { SigningStore } from '../database/store';
import { incrementAuditWriteFailure } from '../metrics/counters';
import { AuditAction, AuditLogRow, RequestContext } from '../types';
import { generateId } from '../utils/crypto';
import { Logger } from '../utils/logger';
import { SigningNotifications } from './notify';

export interface AuditRecord {
  action: AuditAction;
  documentId?: string;
  templateId?: string;
  userId?: string;
  details?: Record<string, unknown>;
  context?: RequestContext;
}

export interface AuditTrailOptions {
  failureAlertThreshold: number;
  notifications?: SigningNotifications;
}

/**
 * Append-only audit writer. Entries are written after the business change has
 * committed; a failed write is logged and counted but never surfaces.
 */
export class AuditTrail {
  private consecutiveFailures = 0;

  constructor(
    private readonly store: SigningStore,
    private readonly options: AuditTrailOptions
  ) {}

  get failureStreak(): number {
    return this.consecutiveFailures;
  }

  async record(entry: AuditRecord): Promise<AuditLogRow | null> {
    try {
      const row = await this.store.repository().insertAuditEntry({
        id: generateId(),
        documentId: entry.documentId ?? null,
        templateId: entry.templateId ?? null,
        userId: entry.userId ?? null,
        action: entry.action,
        details: entry.details ?? {},
        ip: entry.context?.ip ?? null,
        userAgent: entry.context?.userAgent ?? null,
      });
      this.consecutiveFailures = 0;
      return row;
    } catch (error) {
      this.consecutiveFailures += 1;
      incrementAuditWriteFailure(entry.action);

      const meta = {
        action: entry.action,
        documentId: entry.documentId,
        templateId: entry.templateId,
        consecutiveFailures: this.consecutiveFailures,
        error: error instanceof Error ? error.message : String(error),
      };

      if (this.consecutiveFailures >= this.options.failureAlertThreshold) {
        Logger.error('Audit log write failing repeatedly', meta);
        this.options.notifications?.auditDegraded(entry.action, this.consecutiveFailures);
      } else {
        Logger.warn('Audit log write failed', meta);
      }

      return null;
    }
  }
}
