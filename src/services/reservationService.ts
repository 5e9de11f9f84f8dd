/**
 * Reservation Service
 *
 * Core functionality:
 * - Create reservations after checking the customer and hotel exist
 *   and the room number is within the hotel's room count
 * - Modify reservations, re-checking their references
 * - Cancel reservations by ID
 * - Look up and list reservations
 *
 * Neither double-booking a room nor reusing a reservation ID is rejected.
 */

import {
  RecordId,
  Reservation,
  ReservationUpdate,
  ReservationFilters,
  DeleteOutcome,
  EntityErrorCode,
  Result,
  reservationSchema,
  reservationUpdateSchema
} from '../types';
import { Stores } from '../data/store';
import logger from '../utils/logger';
import { failure, success, invalidRecord } from './results';

export class ReservationService {
  constructor(private readonly stores: Stores) {}

  /**
   * Creates a reservation.
   * The customer must exist, the hotel must exist and the room number
   * may not exceed the hotel's room count.
   */
  createReservation(input: Reservation): Result<Reservation> {
    const parsed = reservationSchema.safeParse(input);
    if (!parsed.success) {
      return invalidRecord(parsed.error);
    }

    const invalid = this.checkReferences(parsed.data);
    if (invalid) {
      return invalid;
    }

    const created = this.stores.reservations.create(parsed.data);
    logger.info('Reservation created', {
      reservation_id: created.reservation_id,
      customer_id: created.customer_id,
      hotel_id: created.hotel_id
    });
    return success(created);
  }

  /**
   * Merges the given fields into a reservation. The merged reservation goes
   * through the same customer, hotel and room checks as a new one.
   * The reservation document is rewritten even when the reservation does not exist.
   */
  modifyReservation(reservationId: RecordId, updates: ReservationUpdate): Result<Reservation> {
    const parsed = reservationUpdateSchema.safeParse(updates);
    if (!parsed.success) {
      return invalidRecord(parsed.error);
    }

    const existing = this.stores.reservations.getById(reservationId);
    if (existing) {
      const invalid = this.checkReferences({
        reservation_id: existing.reservation_id,
        customer_id: parsed.data.customer_id ?? existing.customer_id,
        hotel_id: parsed.data.hotel_id ?? existing.hotel_id,
        room_number: parsed.data.room_number ?? existing.room_number
      });
      if (invalid) {
        return invalid;
      }
    }

    const updated = this.stores.reservations.update(reservationId, parsed.data);
    if (!updated) {
      return failure(EntityErrorCode.NOT_FOUND, `Reservation not found: ${reservationId}`, {
        reservation_id: reservationId
      });
    }

    logger.info('Reservation modified', { reservation_id: reservationId, fields: Object.keys(parsed.data) });
    return success(updated);
  }

  /** Returns an INVALID_REFERENCE result, or undefined when every reference holds */
  private checkReferences(reservation: Reservation): Result<Reservation> | undefined {
    const customer = this.stores.customers.getById(reservation.customer_id);
    if (!customer) {
      return failure<Reservation>(EntityErrorCode.INVALID_REFERENCE, `Customer does not exist: ${reservation.customer_id}`, {
        field: 'customer_id',
        customer_id: reservation.customer_id
      });
    }

    const hotel = this.stores.hotels.getById(reservation.hotel_id);
    if (!hotel) {
      return failure<Reservation>(EntityErrorCode.INVALID_REFERENCE, `Hotel does not exist: ${reservation.hotel_id}`, {
        field: 'hotel_id',
        hotel_id: reservation.hotel_id
      });
    }

    if (reservation.room_number > hotel.rooms) {
      return failure<Reservation>(
        EntityErrorCode.INVALID_REFERENCE,
        `Room ${reservation.room_number} exceeds the ${hotel.rooms} rooms of hotel ${hotel.hotel_id}`,
        { field: 'room_number', room_number: reservation.room_number, rooms: hotel.rooms }
      );
    }

    return undefined;
  }

  /**
   * Cancels a reservation; cancelling a missing ID succeeds with removed=false
   */
  cancelReservation(reservationId: RecordId): Result<DeleteOutcome> {
    const removed = this.stores.reservations.delete(reservationId);
    logger.info(removed ? 'Reservation cancelled' : 'No reservation to cancel', {
      reservation_id: reservationId
    });
    return success({ removed });
  }

  displayReservation(reservationId: RecordId): Result<Reservation> {
    const reservation = this.stores.reservations.getById(reservationId);
    if (!reservation) {
      return failure(EntityErrorCode.NOT_FOUND, `Reservation not found: ${reservationId}`, {
        reservation_id: reservationId
      });
    }
    return success(reservation);
  }

  /**
   * Gets all reservations with optional filters
   */
  listReservations(filters?: ReservationFilters): Reservation[] {
    const customerId = filters?.customer_id;
    const hotelId = filters?.hotel_id;
    let reservations = this.stores.reservations.getAll();

    if (customerId !== undefined) {
      reservations = reservations.filter(r => r.customer_id === customerId);
    }

    if (hotelId !== undefined) {
      reservations = reservations.filter(r => r.hotel_id === hotelId);
    }

    return reservations;
  }
}
