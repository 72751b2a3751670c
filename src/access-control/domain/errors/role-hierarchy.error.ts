/**
 * Raised when a role's parent chain cannot be walked to a root
 */
export abstract class RoleHierarchyError extends Error {
  protected constructor(
    message: string,
    readonly roleIds: readonly number[],
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class RoleHierarchyCycleError extends RoleHierarchyError {
  constructor(roleIds: readonly number[], repeatedRoleId: number) {
    super(
      `Role hierarchy cycle: ${[...roleIds, repeatedRoleId].join(' -> ')}`,
      roleIds,
    );
  }
}

export class RoleHierarchyDepthError extends RoleHierarchyError {
  constructor(roleIds: readonly number[], maxDepth: number) {
    super(
      `Role hierarchy deeper than ${maxDepth} starting at role ${roleIds[0]}`,
      roleIds,
    );
  }
}
