/**
 * Record schemas for the three document kinds.
 * Field names match the persisted JSON exactly.
 */

import { z } from 'zod';

const id = z.number().int('ID must be an integer');

export const hotelSchema = z.object({
  hotel_id: id,
  name: z.string(),
  location: z.string(),
  rooms: z.number().int('Rooms must be an integer').min(0, 'Rooms cannot be negative')
});

export const customerSchema = z.object({
  customer_id: id,
  name: z.string(),
  email: z.string()
});

export const reservationSchema = z.object({
  reservation_id: id,
  customer_id: id,
  hotel_id: id,
  room_number: z.number().int('Room number must be an integer')
});

// The primary key is not part of an update; unknown keys are rejected
export const hotelUpdateSchema = hotelSchema.omit({ hotel_id: true }).partial().strict();
export const customerUpdateSchema = customerSchema.omit({ customer_id: true }).partial().strict();
export const reservationUpdateSchema = reservationSchema.omit({ reservation_id: true }).partial().strict();

export const reservationFiltersSchema = z.object({
  customer_id: z.coerce.number().int().optional(),
  hotel_id: z.coerce.number().int().optional()
});
