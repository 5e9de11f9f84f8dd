/**
 * Core type definitions for the Hotel Reservation System
 */

import { z } from 'zod';
import {
  hotelSchema,
  customerSchema,
  reservationSchema,
  hotelUpdateSchema,
  customerUpdateSchema,
  reservationUpdateSchema,
  reservationFiltersSchema
} from './schemas';

/** Integer primary key shared by every record kind */
export type RecordId = number;

/** Hotel record as stored in the hotel document */
export type Hotel = z.infer<typeof hotelSchema>;

/** Customer record as stored in the customer document */
export type Customer = z.infer<typeof customerSchema>;

/**
 * Reservation record as stored in the reservation document.
 * reservation_id is not checked for uniqueness on creation.
 */
export type Reservation = z.infer<typeof reservationSchema>;

/** Partial field updates accepted by modifyHotel */
export type HotelUpdate = z.infer<typeof hotelUpdateSchema>;

/** Partial field updates accepted by modifyCustomer */
export type CustomerUpdate = z.infer<typeof customerUpdateSchema>;

/** Partial field updates accepted by modifyReservation */
export type ReservationUpdate = z.infer<typeof reservationUpdateSchema>;

/** Filters accepted by listReservations */
export type ReservationFilters = z.infer<typeof reservationFiltersSchema>;

/** Outcome codes reported by the entity services and the storage adapter */
export enum EntityErrorCode {
  DUPLICATE_KEY = 'DUPLICATE_KEY',
  NOT_FOUND = 'NOT_FOUND',
  INVALID_REFERENCE = 'INVALID_REFERENCE',
  INVALID_RECORD = 'INVALID_RECORD',
  CORRUPT_STORAGE = 'CORRUPT_STORAGE'
}

/** Result wrapper with success/error handling */
export interface Result<T> {
  success: boolean;
  data?: T;
  error?: {
    code: EntityErrorCode;
    message: string;
    details?: Record<string, unknown>;
  };
}

/** Outcome of a delete or cancel; deleting a missing id is not an error */
export interface DeleteOutcome {
  removed: boolean;
}

/** Names of the three JSON documents */
export interface DocumentNames {
  hotels: string;
  customers: string;
  reservations: string;
}

export * from './schemas';
