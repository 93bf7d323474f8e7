import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { TypeOrmModuleOptions, TypeOrmOptionsFactory } from '@nestjs/typeorm';
import { join } from 'path';
import { AllConfigType } from '../config/config.type';

@Injectable()
export class TypeOrmConfigService implements TypeOrmOptionsFactory {
  constructor(private configService: ConfigService<AllConfigType>) {}

  createTypeOrmOptions(): TypeOrmModuleOptions {
    const database = this.configService.getOrThrow('database', { infer: true });

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
      logging: database.logging,
      entities: [
        join(__dirname, '..', '**', 'relational', 'entities', '*.entity.{ts,js}'),
      ],
      migrations: [join(__dirname, 'migrations', '**', '*{.ts,.js}')],
      extra: {
        max: database.maxConnections,
        ssl: database.sslEnabled
          ? {
              rejectUnauthorized: database.rejectUnauthorized,
              ca: database.ca ?? undefined,
            }
          : undefined,
      },
    };
  }
}
