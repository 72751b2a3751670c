import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AllConfigType } from '../config/config.type';

export interface AccessEventData {
  actorId: number;
  tenantId?: number | null;
  event: AccessEventType;
  resourceKey: string;
  scope?: string;
  subjectId?: number;
  success: boolean;
  errorMessage?: string;
  metadata?: Record<string, unknown>; // Additional event-specific data
}

export enum AccessEventType {
  ACCESS_GRANTED = 'ACCESS_GRANTED',
  ACCESS_REVOKED = 'ACCESS_REVOKED',
  ACCESS_REVOKE_NOT_FOUND = 'ACCESS_REVOKE_NOT_FOUND',
  ROLE_HIERARCHY_INVALID = 'ROLE_HIERARCHY_INVALID',
}

/**
 * Audit Service for access control mutations and integrity problems
 *
 * Entries are single-line structured JSON so a log collector can index them.
 * Only IDs and resource keys are logged; grant config payloads are not,
 * since they may carry tenant-specific settings.
 */
@Injectable()
export class AuditService {
  constructor(private configService: ConfigService<AllConfigType>) {}

  /**
   * Log an access control event
   */
  logAccessEvent(data: AccessEventData): void {
    const logEntry = {
      timestamp: new Date().toISOString(),
      service:
        this.configService.get('app.name', { infer: true }) ??
        'unified-access-control',
      component: 'access-control',
      actorId: data.actorId,
      tenantId: data.tenantId ?? undefined,
      event: data.event,
      resourceKey: data.resourceKey,
      scope: data.scope,
      subjectId: data.subjectId,
      success: data.success,
      errorType: data.errorMessage
        ? this.sanitizeErrorMessage(data.errorMessage)
        : undefined,
      environment: this.configService.get('app.nodeEnv', { infer: true }),
      ...(data.metadata ? { metadata: data.metadata } : {}),
    };

    console.info(JSON.stringify(logEntry));
  }

  /**
   * Strip anything that looks like an email address or token
   */
  private sanitizeErrorMessage(error: string): string {
    return error
      .replace(
        /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g,
        '[EMAIL_REDACTED]',
      )
      .replace(/Bearer\s+[^\s]+/gi, 'Bearer [TOKEN_REDACTED]')
      .replace(/token[:\s]+[^\s]+/gi, 'token: [REDACTED]')
      .substring(0, 500);
  }
}
