export enum AccessType {
  PERMISSION = 'permission',
  FEATURE_FLAG = 'feature_flag',
  ENTITLEMENT = 'entitlement',
}
