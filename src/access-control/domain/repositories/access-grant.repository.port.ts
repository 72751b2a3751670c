import { GrantScope } from '../enums/grant-scope.enum';
import { NullableType } from '../../../utils/types/nullable.type';
import { AccessGrant, AccessGrantState } from '../entities/access-grant.entity';

export abstract class AccessGrantRepository {
  /**
   * Find the grant of a definition to one tenant, role or user
   */
  abstract findOne(
    scope: GrantScope,
    subjectId: number,
    definitionId: number,
  ): Promise<NullableType<AccessGrant>>;

  /**
   * Find all grants held by one tenant, role or user, enabled or not
   */
  abstract findBySubject(
    scope: GrantScope,
    subjectId: number,
  ): Promise<AccessGrant[]>;

  /**
   * Create the grant, or replace the state of the existing one
   */
  abstract upsert(
    scope: GrantScope,
    subjectId: number,
    definitionId: number,
    state: AccessGrantState,
  ): Promise<AccessGrant>;

  /**
   * Delete the grant; resolves to false when there was none
   */
  abstract delete(
    scope: GrantScope,
    subjectId: number,
    definitionId: number,
  ): Promise<boolean>;
}
