import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AllConfigType } from '../../../config/config.type';
import { DEFAULT_ROLE_HIERARCHY_MAX_DEPTH } from '../../config/access-control.config';
import { RoleRepository } from '../repositories/role.repository.port';
import { RoleNode } from '../entities/role.entity';
import {
  RoleHierarchyCycleError,
  RoleHierarchyDepthError,
} from '../errors/role-hierarchy.error';

/**
 * RoleHierarchyDomainService
 *
 * Walks a role's parent pointers up to the root role.
 *
 * Roles form a forest per tenant. The walk tracks visited role IDs and stops
 * with RoleHierarchyCycleError on a repeat, or RoleHierarchyDepthError past
 * the configured depth. A parent that no longer exists ends the chain.
 */
@Injectable()
export class RoleHierarchyDomainService {
  private readonly maxDepth: number;

  constructor(
    private readonly roleRepository: RoleRepository,
    private readonly configService: ConfigService<AllConfigType>,
  ) {
    this.maxDepth =
      this.configService.get('accessControl.roleHierarchyMaxDepth', {
        infer: true,
      }) ?? DEFAULT_ROLE_HIERARCHY_MAX_DEPTH;
  }

  /**
   * Yield the role and then each ancestor, leaf to root.
   *
   * Parents are loaded lazily, so a consumer that stops early saves lookups.
   */
  async *walkUp(role: RoleNode): AsyncGenerator<RoleNode, void, undefined> {
    const visited: number[] = [];
    let current: RoleNode | null = role;

    while (current) {
      if (visited.includes(current.id)) {
        throw new RoleHierarchyCycleError(visited, current.id);
      }
      if (visited.length >= this.maxDepth) {
        throw new RoleHierarchyDepthError(visited, this.maxDepth);
      }
      visited.push(current.id);

      yield current;

      current =
        current.parentId === null
          ? null
          : await this.roleRepository.findById(current.parentId);
    }
  }

  /**
   * @returns The role followed by its ancestors (leaf → root)
   */
  async getAncestorChain(role: RoleNode): Promise<RoleNode[]> {
    const chain: RoleNode[] = [];
    for await (const node of this.walkUp(role)) {
      chain.push(node);
    }
    return chain;
  }

  /**
   * @returns The root ancestor first and the role itself last
   */
  async getRootToLeafChain(role: RoleNode): Promise<RoleNode[]> {
    const chain = await this.getAncestorChain(role);
    return chain.reverse();
  }
}
