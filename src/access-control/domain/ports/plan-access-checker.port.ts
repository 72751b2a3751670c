import { Plan } from '../entities/access-subject.entity';

export abstract class PlanAccessChecker {
  /**
   * Whether a billing module is enabled for a plan
   */
  abstract getModuleAccess(plan: Plan, moduleName: string): Promise<boolean>;
}
