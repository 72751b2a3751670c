export interface Role {
  id: number;
  name: string;
  description: string;
  tenantId: number | null; // null = system-wide role
  parentId: number | null; // Permissions are inherited from the parent chain
  isSystemRole: boolean;
  isAssignable: boolean;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * The part of a role needed to walk the hierarchy
 */
export type RoleNode = Pick<Role, 'id' | 'name' | 'parentId'>;
