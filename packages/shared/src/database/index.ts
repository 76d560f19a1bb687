import { DataSourceOptions, EntitySchema } from 'typeorm';

export type DatabaseType = 'better-sqlite3' | 'postgres';

export type EntityTarget = Function | string | EntitySchema;

export interface DatabaseConfig {
  type: DatabaseType;
  /** SQLite file path (or `:memory:`), or the Postgres database name. */
  database: string;
  host: string;
  port: number;
  username: string;
  password: string;
  synchronize: boolean;
  logging?: boolean;
}

export const isDatabaseType = (value: string): value is DatabaseType =>
  value === 'better-sqlite3' || value === 'postgres';

export const createDataSourceOptions = (config: DatabaseConfig, entities: EntityTarget[]): DataSourceOptions => {
  if (config.type === 'better-sqlite3') {
    return {
      type: 'better-sqlite3',
      database: config.database,
      entities,
      synchronize: config.synchronize,
      logging: config.logging || false,
    };
  }

  return {
    type: 'postgres',
    host: config.host,
    port: config.port,
    username: config.username,
    password: config.password,
    database: config.database,
    entities,
    synchronize: config.synchronize,
    logging: config.logging || false,
  };
};
