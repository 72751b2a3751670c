import { Injectable } from '@nestjs/common';
import { PlanAccessChecker } from '../../domain/ports/plan-access-checker.port';
import { Plan } from '../../domain/entities/access-subject.entity';

/**
 * Default PlanAccessChecker: reads the module flag from the plan's
 * features config. Modules missing from the config are disabled.
 *
 * e.g. { billing: { enabled: true, features: { invoices: true } } }
 */
@Injectable()
export class PlanFeaturesConfigChecker extends PlanAccessChecker {
  async getModuleAccess(plan: Plan, moduleName: string): Promise<boolean> {
    return plan.featuresConfig[moduleName]?.enabled === true;
  }

  /**
   * Whether a feature is on, given its module is on
   */
  async getFeatureAccess(
    plan: Plan,
    moduleName: string,
    featureKey: string,
  ): Promise<boolean> {
    if (!(await this.getModuleAccess(plan, moduleName))) {
      return false;
    }
    return plan.featuresConfig[moduleName]?.features?.[featureKey] === true;
  }
}
