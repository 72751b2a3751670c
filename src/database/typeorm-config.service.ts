import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { TypeOrmModuleOptions, TypeOrmOptionsFactory } from '@nestjs/typeorm';
import { AllConfigType } from '../config/config.type';
import { accessControlEntities } from '../access-control/infrastructure/persistence/relational/entities';

@Injectable()
export class TypeOrmConfigService implements TypeOrmOptionsFactory {
  constructor(private configService: ConfigService<AllConfigType>) {}

  createTypeOrmOptions(): TypeOrmModuleOptions {
    const database = this.configService.getOrThrow('database', { infer: true });
    const sslEnabled = database.sslEnabled ?? false;

    return {
      type: 'postgres',
      url: database.url,
      host: database.host,
      port: database.port,
      username: database.username,
      password: database.password,
      database: database.name,
      synchronize: database.synchronize,
      dropSchema: false,
      logging: database.logging ?? false,
      entities: accessControlEntities,
      migrations: [__dirname + '/migrations/**/*{.ts,.js}'],
      extra: {
        // based on https://node-postgres.com/api/pool
        // max connection pool size
        max: database.maxConnections,
        ssl: sslEnabled
          ? {
              rejectUnauthorized: database.rejectUnauthorized,
              ca: database.ca ?? undefined,
              key: database.key ?? undefined,
              cert: database.cert ?? undefined,
            }
          : undefined,
      },
    };
  }
}
