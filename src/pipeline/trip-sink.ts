import type { CleanedTripRecord, Zone } from '../core/types';

/**
 * Durable destination for cleaned trips. `insertBatch` must commit all of
 * its records in one transaction or none of them.
 */
export interface TripSink {
  /** Creates the destination tables if needed; called once before the first chunk. */
  prepare(): Promise<void>;
  insertBatch(records: readonly CleanedTripRecord[]): Promise<void>;
  insertOne(record: CleanedTripRecord): Promise<void>;
  /** Returns vendor ids for the given codes, creating missing vendors. */
  resolveVendorIds(codes: readonly string[]): Promise<Map<string, number>>;
  loadZones(): Promise<Zone[]>;
}
