/**
 * Type definitions for the holdings backend services
 * @module types
 */

// Re-export lookup service types
export type {
  HoldingQuery,
  HoldingRecord,
  HoldingFilters,
  HoldingStore,
  LookupQuestion
} from './lookup-services/types.js'
