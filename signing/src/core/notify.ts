import { NotificationEvent, WebhookNotifier } from '@sealdesk/notifications';
import { DocumentRow, DocumentSignerRow } from '../types';
import { Logger } from '../utils/logger';

export type Notifier = Pick<WebhookNotifier, 'notify'>;

/** Fire-and-forget bridge to the notification collaborator. */
export class SigningNotifications {
  constructor(private readonly notifier?: Notifier) {}

  private dispatch(event: NotificationEvent): void {
    if (!this.notifier) {
      return;
    }

    void this.notifier.notify(event).catch((error: unknown) => {
      Logger.warn('Notification dispatch failed', {
        type: event.type,
        error: error instanceof Error ? error.message : String(error),
      });
    });
  }

  documentSent(document: DocumentRow, signer: DocumentSignerRow): void {
    this.dispatch({
      source: 'signing',
      type: 'DOCUMENT_SENT',
      severity: 'info',
      dedupKey: `document-sent:${document.id}:${signer.id}`,
      message: `Document "${document.name}" is ready for ${signer.signer_name} to sign`,
      correlation: {
        documentId: document.id,
        templateId: document.template_id,
        tenantId: document.tenant_id,
        recipientEmail: signer.signer_email,
      },
      metadata: { signerOrder: signer.signer_order },
    });
  }

  documentCompleted(document: DocumentRow): void {
    this.dispatch({
      source: 'signing',
      type: 'DOCUMENT_COMPLETED',
      severity: 'info',
      dedupKey: `document-completed:${document.id}`,
      message: `Document "${document.name}" was signed by every recipient`,
      correlation: {
        documentId: document.id,
        templateId: document.template_id,
        tenantId: document.tenant_id,
      },
      metadata: { finalDocumentHash: document.final_document_hash },
    });
  }

  auditDegraded(action: string, consecutiveFailures: number): void {
    this.dispatch({
      source: 'signing',
      type: 'AUDIT_WRITE_DEGRADED',
      severity: 'critical',
      dedupKey: 'audit-write-degraded',
      message: `Audit log writes are failing (${consecutiveFailures} consecutive failures)`,
      correlation: { auditAction: action },
      metadata: { consecutiveFailures },
    });
  }
}
