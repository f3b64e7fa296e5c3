import { existsSync } from 'fs';
import type { TypeOrmModuleOptions } from '@nestjs/typeorm';
import type { AppConfig } from '../../../shared/config/app.config';
import { SaleEntity } from './entities/sale.orm-entity';

export const IN_MEMORY_DATABASE = ':memory:';

/**
 * SQLite connection for the sales warehouse. The schema is only synchronized
 * when the database is created by this process; an existing warehouse file is
 * opened as it is and never altered.
 */
export function buildDatabaseOptions(
  config: AppConfig,
  fileExists: (path: string) => boolean = existsSync,
): TypeOrmModuleOptions {
  const fresh =
    config.databasePath === IN_MEMORY_DATABASE ||
    !fileExists(config.databasePath);

  return {
    type: 'sqlite',
    database: config.databasePath,
    entities: [SaleEntity],
    synchronize: fresh,
  };
}
