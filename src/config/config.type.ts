import { AppConfig } from './app-config.type';
import { DatabaseConfig } from '../database/config/database-config.type';
import { AccessControlConfig } from '../access-control/config/access-control-config.type';

export type AllConfigType = {
  app: AppConfig;
  database: DatabaseConfig;
  accessControl: AccessControlConfig;
};
