/**
 * Hotel Service
 *
 * Create, delete, display and modify hotels. Hotel IDs are unique
 * within the hotel document.
 */

import {
  RecordId,
  Hotel,
  HotelUpdate,
  DeleteOutcome,
  EntityErrorCode,
  Result,
  hotelSchema,
  hotelUpdateSchema
} from '../types';
import { HotelStore } from '../data/store';
import logger from '../utils/logger';
import { failure, success, invalidRecord } from './results';

export class HotelService {
  constructor(private readonly hotels: HotelStore) {}

  /**
   * Creates a new hotel; rejects an ID that is already in use
   */
  createHotel(input: Hotel): Result<Hotel> {
    const parsed = hotelSchema.safeParse(input);
    if (!parsed.success) {
      return invalidRecord(parsed.error);
    }

    const created = this.hotels.create(parsed.data);
    if (!created) {
      return failure(EntityErrorCode.DUPLICATE_KEY, `Hotel ID already exists: ${parsed.data.hotel_id}`, {
        hotel_id: parsed.data.hotel_id
      });
    }

    logger.info('Hotel created', { hotel_id: created.hotel_id });
    return success(created);
  }

  /**
   * Deletes a hotel. A missing ID is not an error, and reservations
   * referencing the hotel are left as they are.
   */
  deleteHotel(hotelId: RecordId): Result<DeleteOutcome> {
    const removed = this.hotels.delete(hotelId);
    logger.info(removed ? 'Hotel deleted' : 'No hotel to delete', { hotel_id: hotelId });
    return success({ removed });
  }

  displayHotel(hotelId: RecordId): Result<Hotel> {
    const hotel = this.hotels.getById(hotelId);
    if (!hotel) {
      return failure(EntityErrorCode.NOT_FOUND, `Hotel not found: ${hotelId}`, { hotel_id: hotelId });
    }
    return success(hotel);
  }

  /**
   * Merges the given fields into a hotel. The hotel document is rewritten
   * even when the hotel does not exist.
   */
  modifyHotel(hotelId: RecordId, updates: HotelUpdate): Result<Hotel> {
    const parsed = hotelUpdateSchema.safeParse(updates);
    if (!parsed.success) {
      return invalidRecord(parsed.error);
    }

    const updated = this.hotels.update(hotelId, parsed.data);
    if (!updated) {
      return failure(EntityErrorCode.NOT_FOUND, `Hotel not found: ${hotelId}`, { hotel_id: hotelId });
    }

    logger.info('Hotel modified', { hotel_id: hotelId, fields: Object.keys(parsed.data) });
    return success(updated);
  }

  listHotels(): Hotel[] {
    return this.hotels.getAll();
  }
}
