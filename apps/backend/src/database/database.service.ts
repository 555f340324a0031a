import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Database from 'better-sqlite3';
import { mkdirSync, readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { resolveAssetPath } from '../common/utils/asset-path';

export const DEFAULT_DATABASE_PATH = 'data/history.db';
const IN_MEMORY = ':memory:';

@Injectable()
export class DatabaseService implements OnModuleDestroy {
  private readonly logger = new Logger(DatabaseService.name);
  readonly connection: Database.Database;

  constructor(configService: ConfigService) {
    const configured = configService.get<string>('DATABASE_PATH')?.trim() || DEFAULT_DATABASE_PATH;
    const location = configured === IN_MEMORY ? IN_MEMORY : resolve(process.cwd(), configured);

    if (location !== IN_MEMORY) {
      mkdirSync(dirname(location), { recursive: true });
    }

    this.connection = new Database(location);
    if (location !== IN_MEMORY) {
      this.connection.pragma('journal_mode = WAL');
    }
    this.connection.pragma('foreign_keys = ON');
    this.connection.exec(readFileSync(resolveAssetPath('database', 'schema.sql'), 'utf-8'));
    this.logger.log(`SQLite database ready at ${location}`);
  }

  /** Runs `work` inside a transaction; it rolls back if `work` throws. */
  transaction<T>(work: () => T): T {
    return this.connection.transaction(work)();
  }

  isHealthy(): boolean {
    try {
      this.connection.prepare('SELECT 1').get();
      return true;
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown database error';
      this.logger.error(`Database health check failed: ${message}`);
      return false;
    }
  }

  onModuleDestroy() {
    if (this.connection.open) {
      this.connection.close();
    }
  }
}
