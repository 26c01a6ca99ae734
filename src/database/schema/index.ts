// Drizzle ORM Schema Definitions
// Central barrel export for all database tables

// Media Library
export * from './media.schema';

// Archive batch ledger
export * from './archive.schema';
