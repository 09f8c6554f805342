import { registerAs } from '@nestjs/config';

export type TaskStore = 'postgres' | 'memory';

export interface DatabaseConfig {
  host: string;
  port: number;
  username: string | undefined;
  password: string | undefined;
  database: string | undefined;
  synchronize: boolean;
  logging: boolean;
}

export function resolveTaskStore(raw: string | undefined): TaskStore {
  return raw?.trim().toLowerCase() === 'memory' ? 'memory' : 'postgres';
}

export default registerAs('database', (): DatabaseConfig => ({
  host: process.env.DB_HOST || 'localhost',
  port: parseInt(process.env.DB_PORT || '5432', 10),
  username: process.env.DB_USERNAME,
  password: process.env.DB_PASSWORD,
  database: process.env.DB_DATABASE,
  synchronize: process.env.NODE_ENV === 'development',
  logging: process.env.NODE_ENV === 'development',
}));
