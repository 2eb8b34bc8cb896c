import {
  Inject,
  Injectable,
  Logger,
  OnApplicationShutdown,
  OnModuleInit,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ensureSchema, type Database } from '@postboard/infrastructure';
import { Kysely, PostgresDialect } from 'kysely';
import { Pool } from 'pg';
import type { Env } from '../../../config/env';

/**
 * Owns the Postgres connection when `STORAGE_DRIVER=postgres`. With the memory
 * driver no pool is ever opened and `getDb` refuses.
 */
@Injectable()
export class DatabaseService implements OnModuleInit, OnApplicationShutdown {
  private readonly logger = new Logger(DatabaseService.name);
  private readonly db: Kysely<Database> | null;

  constructor(
    @Inject(ConfigService) config: ConfigService<Env, true>
  ) {
    if (config.get('STORAGE_DRIVER', { infer: true }) !== 'postgres') {
      this.db = null;
      return;
    }
    const connectionString = config.get('DATABASE_URL', { infer: true });
    if (!connectionString) {
      throw new Error('DATABASE_URL is required for postgres storage');
    }
    const dialect = new PostgresDialect({
      pool: new Pool({ connectionString }),
    });
    this.db = new Kysely<Database>({ dialect });
  }

  getDb(): Kysely<Database> {
    if (!this.db) {
      throw new Error('No database configured: STORAGE_DRIVER is memory');
    }
    return this.db;
  }

  async onModuleInit(): Promise<void> {
    if (!this.db) return;
    await ensureSchema(this.db);
    this.logger.log('Schema ready');
  }

  /** After every module is destroyed, so the projection has let go. */
  async onApplicationShutdown(): Promise<void> {
    await this.db?.destroy();
  }
}
