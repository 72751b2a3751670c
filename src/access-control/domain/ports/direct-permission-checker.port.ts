import { AccessSubject } from '../entities/access-subject.entity';

/**
 * Conventional app-permission check, e.g. "leads.view_lead".
 * The resolver treats the answer as opaque.
 */
export abstract class DirectPermissionChecker {
  abstract hasPermission(
    subject: AccessSubject,
    codename: string,
  ): Promise<boolean>;
}
