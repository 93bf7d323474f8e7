import 'reflect-metadata';
import 'dotenv/config';
import { join } from 'path';
import { DataSource } from 'typeorm';

// Used by the TypeORM CLI for migrations; the app builds its options in TypeOrmConfigService.
export const AppDataSource = new DataSource({
  type: 'postgres',
  url: process.env.DATABASE_URL,
  host: process.env.DATABASE_HOST,
  port: process.env.DATABASE_PORT
    ? parseInt(process.env.DATABASE_PORT, 10)
    : 5432,
  username: process.env.DATABASE_USERNAME,
  password: process.env.DATABASE_PASSWORD,
  database: process.env.DATABASE_NAME,
  synchronize: false,
  dropSchema: false,
  logging: process.env.NODE_ENV !== 'production',
  entities: [
    join(__dirname, '..', '**', 'relational', 'entities', '*.entity.{ts,js}'),
  ],
  migrations: [join(__dirname, 'migrations', '**', '*{.ts,.js}')],
});
