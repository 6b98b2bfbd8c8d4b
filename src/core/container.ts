/**
 * Dependency Injection Container
 * Layer: Core
 *
 * The single place where tokens are mapped to implementations. No class ever
 * does `new KnexSwiftCodeRepository(...)` by hand; it asks the container.
 *
 *   - `reflect-metadata` must load first: tsyringe reads the constructor
 *     metadata that @injectable/@inject record.
 *   - `useValue` registers a ready-made singleton (the logger).
 *   - The Knex instance is built on first resolve, so importing the container
 *     does not open a database. Tests register their own Knex under the same
 *     token before anything resolves it.
 *   - `useClass` builds a fresh instance per resolve, injecting its own
 *     dependencies.
 */
import 'reflect-metadata';
import { container, instanceCachingFactory } from 'tsyringe';

import { TOKENS } from './types';
import { logger } from './logger';

import { IngestionService } from '@application/services/IngestionService';
import { SwiftCodeService } from '@application/services/SwiftCodeService';
import { SpreadsheetDataSourceAdapter } from '@etl/SpreadsheetDataSourceAdapter';
import { SpreadsheetReader } from '@etl/SpreadsheetReader';
import { getDbConnection } from '@infrastructure/database/connection';
import { KnexSwiftCodeRepository } from '@infrastructure/repositories/KnexSwiftCodeRepository';

container.register(TOKENS.Logger, { useValue: logger });
container.register(TOKENS.Knex, { useFactory: instanceCachingFactory(() => getDbConnection()) });
container.register(TOKENS.SwiftCodeRepository, { useClass: KnexSwiftCodeRepository });
container.register(TOKENS.DataSourceReader, { useClass: SpreadsheetReader });
container.register(TOKENS.DataSourceAdapter, { useClass: SpreadsheetDataSourceAdapter });
container.register(TOKENS.SwiftCodeService, { useClass: SwiftCodeService });
container.register(TOKENS.IngestionService, { useClass: IngestionService });

export { container };
