export type NotificationSeverity = 'info' | 'warning' | 'critical';
export type NotificationSeverityRoute = 'informational' | 'operations' | 'pager';

export const NOTIFICATION_ROUTING_VERSION = '2026-10-01';
export const DEFAULT_TEMPLATE_VERSION = 'generic-v1';

export const NOTIFICATION_TEMPLATE_VERSIONS: Record<string, string> = {
  DOCUMENT_SENT: 'document-sent-v1',
  DOCUMENT_COMPLETED: 'document-completed-v1',
  AUDIT_WRITE_DEGRADED: 'audit-degraded-v1',
};

export interface NotificationEvent {
  source: 'signing' | string;
  type: string;
  severity: NotificationSeverity;
  dedupKey: string;
  message: string;
  correlation: {
    documentId?: string;
    templateId?: string;
    tenantId?: string;
    recipientEmail?: string;
    auditAction?: string;
  };
  metadata?: Record<string, string | number | boolean | null>;
}

export interface NotifierLogger {
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

export interface WebhookNotifierConfig {
  enabled: boolean;
  webhookUrl?: string;
  cooldownMs: number;
  requestTimeoutMs?: number;
  retryAttempts?: number;
  retryDelayMs?: number;
  maxRetryDelayMs?: number;
  logger?: NotifierLogger;
  fetchImpl?: typeof fetch;
  nowMs?: () => number;
}

interface SlackPayload {
  text: string;
  attachments: Array<{
    color: string;
    fields: Array<{
      title: string;
      value: string;
      short: boolean;
    }>;
  }>;
}

const DEFAULT_TIMEOUT_MS = 5000;
const DEFAULT_RETRY_ATTEMPTS = 0;
const DEFAULT_RETRY_DELAY_MS = 250;
const DEFAULT_MAX_RETRY_DELAY_MS = 2000;
const MAX_RETRY_ATTEMPTS_CAP = 5;

export class WebhookNotifier {
  private readonly dedupCache = new Map<string, number>();

  constructor(private readonly config: WebhookNotifierConfig) {}

  private log(level: 'info' | 'warn' | 'error', message: string, meta?: Record<string, unknown>): void {
    if (this.config.logger) {
      this.config.logger[level](message, meta);
      return;
    }

    const line = JSON.stringify({ level, message, ...meta });
    if (level === 'error') {
      console.error(line);
    } else if (level === 'warn') {
      console.warn(line);
    } else {
      console.log(line);
    }
  }

  private now(): number {
    return this.config.nowMs ? this.config.nowMs() : Date.now();
  }

  private colorForSeverity(severity: NotificationSeverity): string {
    if (severity === 'critical') return '#d32f2f';
    if (severity === 'warning') return '#f57c00';
    return '#1976d2';
  }

  private severityRouteForSeverity(severity: NotificationSeverity): NotificationSeverityRoute {
    if (severity === 'critical') return 'pager';
    if (severity === 'warning') return 'operations';
    return 'informational';
  }

  private templateVersionForType(type: string): string {
    return NOTIFICATION_TEMPLATE_VERSIONS[type] ?? DEFAULT_TEMPLATE_VERSION;
  }

  private normalizeRetryAttempts(): number {
    const normalized = Math.trunc(this.config.retryAttempts ?? DEFAULT_RETRY_ATTEMPTS);
    if (normalized <= 0) {
      return 0;
    }

    return Math.min(normalized, MAX_RETRY_ATTEMPTS_CAP);
  }

  private retryDelayForAttempt(attempt: number): number {
    const baseDelayMs = Math.max(0, Math.trunc(this.config.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS));
    const maxDelayMs = Math.max(
      baseDelayMs,
      Math.max(0, Math.trunc(this.config.maxRetryDelayMs ?? DEFAULT_MAX_RETRY_DELAY_MS))
    );
    const delay = baseDelayMs * Math.pow(2, Math.max(0, attempt - 1));
    return Math.min(delay, maxDelayMs);
  }

  private async sleep(ms: number): Promise<void> {
    if (ms <= 0) {
      return;
    }

    await new Promise((resolve) => setTimeout(resolve, ms));
  }

  get trackedDedupKeys(): number {
    return this.dedupCache.size;
  }

  private pruneExpiredDedupKeys(now: number): void {
    for (const [key, timestamp] of this.dedupCache) {
      if (now - timestamp >= this.config.cooldownMs) {
        this.dedupCache.delete(key);
      }
    }
  }

  private isInCooldown(dedupKey: string): boolean {
    this.pruneExpiredDedupKeys(this.now());
    const previousTimestamp = this.dedupCache.get(dedupKey);
    return previousTimestamp !== undefined && this.now() - previousTimestamp < this.config.cooldownMs;
  }

  toSlackPayload(event: NotificationEvent): SlackPayload {
    const correlationRows: Array<[string, string | undefined]> = [
      ['documentId', event.correlation.documentId],
      ['templateId', event.correlation.templateId],
      ['tenantId', event.correlation.tenantId],
      ['recipientEmail', event.correlation.recipientEmail],
      ['auditAction', event.correlation.auditAction],
      ['templateVersion', this.templateVersionForType(event.type)],
      ['severityRoute', this.severityRouteForSeverity(event.severity)],
      ['routingVersion', NOTIFICATION_ROUTING_VERSION],
    ];

    const fields: SlackPayload['attachments'][number]['fields'] = [];
    for (const [title, value] of correlationRows) {
      if (value) {
        fields.push({ title, value, short: true });
      }
    }

    return {
      text: `[${event.source}] ${event.type} (${event.severity})`,
      attachments: [
        {
          color: this.colorForSeverity(event.severity),
          fields: [{ title: 'message', value: event.message, short: false }, ...fields],
        },
      ],
    };
  }

  /**
   * Delivers an event to the configured webhook. Resolves `false` instead of
   * throwing when delivery is disabled, deduplicated or exhausts its retries.
   */
  async notify(event: NotificationEvent): Promise<boolean> {
    if (!this.config.enabled) {
      return false;
    }

    if (!this.config.webhookUrl) {
      this.log('warn', 'Notification dropped because webhook URL is not configured', {
        source: event.source,
        type: event.type,
      });
      return false;
    }

    if (this.isInCooldown(event.dedupKey)) {
      this.log('info', 'Notification suppressed by cooldown dedup', {
        dedupKey: event.dedupKey,
        cooldownMs: this.config.cooldownMs,
      });
      return false;
    }

    const fetchImpl = this.config.fetchImpl ?? fetch;
    const body = JSON.stringify(this.toSlackPayload(event));
    const timeoutMs = this.config.requestTimeoutMs ?? DEFAULT_TIMEOUT_MS;
    const totalAttempts = this.normalizeRetryAttempts() + 1;

    for (let attempt = 1; attempt <= totalAttempts; attempt += 1) {
      const timeoutController = new AbortController();
      const timeoutHandle = setTimeout(() => {
        timeoutController.abort();
      }, timeoutMs);

      try {
        const response = await fetchImpl(this.config.webhookUrl, {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body,
          signal: timeoutController.signal,
        });

        if (response.ok) {
          this.dedupCache.set(event.dedupKey, this.now());
          this.log('info', 'Notification sent', {
            source: event.source,
            type: event.type,
            severity: event.severity,
            attempt,
            totalAttempts,
          });
          return true;
        }

        this.log('error', 'Notification webhook request failed', {
          status: response.status,
          statusText: response.statusText,
          type: event.type,
          attempt,
          totalAttempts,
        });
      } catch (error: unknown) {
        this.log('error', 'Notification webhook request errored', {
          error: error instanceof Error ? error.message : String(error),
          type: event.type,
          attempt,
          totalAttempts,
        });
      } finally {
        clearTimeout(timeoutHandle);
      }

      if (attempt < totalAttempts) {
        const delayMs = this.retryDelayForAttempt(attempt);
        this.log('warn', 'Retrying notification delivery', {
          type: event.type,
          dedupKey: event.dedupKey,
          nextAttempt: attempt + 1,
          totalAttempts,
          delayMs,
        });
        await this.sleep(delayMs);
      }
    }

    return false;
  }
}
