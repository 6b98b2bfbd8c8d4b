/**
 * Dependency Injection Tokens
 * Layer: Core
 *
 * Every injectable dependency is looked up in the tsyringe container by one of
 * these symbols. Registering a new repository, service or adapter starts by
 * adding its token here.
 */
export const TOKENS = {
  // Infrastructure
  Knex: Symbol.for('Knex'),
  Logger: Symbol.for('Logger'),

  // Repositories
  SwiftCodeRepository: Symbol.for('SwiftCodeRepository'),

  // Services
  SwiftCodeService: Symbol.for('SwiftCodeService'),
  IngestionService: Symbol.for('IngestionService'),

  // ETL: reading and normalizing the source spreadsheet
  DataSourceReader: Symbol.for('DataSourceReader'),
  DataSourceAdapter: Symbol.for('DataSourceAdapter'),
} as const;
