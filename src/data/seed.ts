/**
 * Sample data loader
 *
 * Creates each document with a small starter set if it does not exist yet.
 * Existing documents are never touched.
 */

import { Hotel, Customer, Reservation, DocumentNames } from '../types';
import { JsonFileStorage } from './jsonFile';
import logger from '../utils/logger';

export const SAMPLE_HOTELS: Hotel[] = [
  { hotel_id: 1, name: 'Hotel Paradise', location: 'New York', rooms: 100 },
  { hotel_id: 2, name: 'Ocean View Resort', location: 'Miami', rooms: 200 }
];

export const SAMPLE_CUSTOMERS: Customer[] = [
  { customer_id: 1, name: 'John Doe', email: 'john@example.com' },
  { customer_id: 2, name: 'Jane Smith', email: 'jane@example.com' }
];

export const SAMPLE_RESERVATIONS: Reservation[] = [
  { reservation_id: 1, customer_id: 1, hotel_id: 1, room_number: 50 },
  { reservation_id: 2, customer_id: 2, hotel_id: 2, room_number: 100 }
];

export interface SeedOutcome {
  document: string;
  created: boolean;
}

export function seedSampleData(storage: JsonFileStorage, documents: DocumentNames): SeedOutcome[] {
  const starters: Array<[string, readonly unknown[]]> = [
    [documents.hotels, SAMPLE_HOTELS],
    [documents.customers, SAMPLE_CUSTOMERS],
    [documents.reservations, SAMPLE_RESERVATIONS]
  ];

  return starters.map(([document, records]) => {
    if (storage.exists(document)) {
      logger.info(`Document ${document} already exists`);
      return { document, created: false };
    }

    storage.write(document, records);
    logger.info(`Document ${document} created with sample data`, { records: records.length });
    return { document, created: true };
  });
}
