import { DOCUMENT_STATUSES, DocumentRow, DocumentStatus } from '../types';
import { ConflictError, DocumentClosedError } from '../utils/errors';

const ALLOWED_TRANSITIONS: Record<DocumentStatus, DocumentStatus[]> = {
  draft: ['scheduled', 'sent', 'expired', 'cancelled'],
  scheduled: ['sent', 'expired', 'cancelled'],
  sent: ['in_progress', 'expired', 'cancelled'],
  in_progress: ['completed', 'expired', 'cancelled'],
  completed: [],
  expired: [],
  cancelled: [],
};

const TERMINAL_STATUSES: DocumentStatus[] = ['completed', 'expired', 'cancelled'];

export function isTerminal(status: DocumentStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

export function acceptsSubmissions(status: DocumentStatus): boolean {
  return status === 'sent' || status === 'in_progress';
}

/** Statuses that may move to `next`; used as the compare-and-set guard. */
export function sourcesFor(next: DocumentStatus): DocumentStatus[] {
  return DOCUMENT_STATUSES.filter((status) => ALLOWED_TRANSITIONS[status].includes(next));
}

export function assertValidTransition(documentId: string, current: DocumentStatus, next: DocumentStatus): void {
  if (isTerminal(current)) {
    throw new DocumentClosedError(documentId, current);
  }

  if (!ALLOWED_TRANSITIONS[current].includes(next)) {
    throw new ConflictError(`Invalid document status transition: ${current} -> ${next}`, {
      documentId,
      current,
      next,
    });
  }
}

export function assertAcceptsSubmissions(document: DocumentRow): void {
  if (isTerminal(document.status)) {
    throw new DocumentClosedError(document.id, document.status);
  }

  if (!acceptsSubmissions(document.status)) {
    throw new ConflictError(`Document ${document.id} has not been sent`, {
      documentId: document.id,
      status: document.status,
    });
  }
}

export function isOverdue(document: DocumentRow, now: Date): boolean {
  return (
    !isTerminal(document.status) && document.expires_at !== null && document.expires_at.getTime() <= now.getTime()
  );
}
