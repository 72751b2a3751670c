import { Injectable } from '@nestjs/common';
import { DirectPermissionChecker } from '../../domain/ports/direct-permission-checker.port';
import { AccessSubject } from '../../domain/entities/access-subject.entity';

/**
 * Default DirectPermissionChecker: looks the codename up in the
 * permissions the caller resolved onto the subject.
 */
@Injectable()
export class SubjectPermissionsChecker extends DirectPermissionChecker {
  async hasPermission(
    subject: AccessSubject,
    codename: string,
  ): Promise<boolean> {
    return subject.permissions?.includes(codename) ?? false;
  }
}
