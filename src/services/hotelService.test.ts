/**
 * Tests for Hotel Service
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import { HotelService } from './hotelService';
import { JsonFileStorage } from '../data/jsonFile';
import { createStores } from '../data/store';
import { EntityErrorCode } from '../types';

const DOCUMENTS = {
  hotels: 'hotels.json',
  customers: 'customers.json',
  reservations: 'reservations.json'
};

describe('Hotel Service', () => {
  let dataDir: string;
  let storage: JsonFileStorage;
  let service: HotelService;

  beforeEach(() => {
    dataDir = fs.mkdtempSync(path.join(os.tmpdir(), 'hotel-service-'));
    storage = new JsonFileStorage(dataDir);
    service = new HotelService(createStores(storage, DOCUMENTS).hotels);
  });

  afterEach(() => {
    fs.rmSync(dataDir, { recursive: true, force: true });
  });

  describe('createHotel', () => {
    it('should store a new hotel', () => {
      const result = service.createHotel({ hotel_id: 1, name: 'Hotel Paradise', location: 'New York', rooms: 100 });

      expect(result.success).toBe(true);
      expect(storage.read('hotels.json')).toEqual([
        { hotel_id: 1, name: 'Hotel Paradise', location: 'New York', rooms: 100 }
      ]);
    });

    it('should reject a duplicate hotel ID and keep the first hotel', () => {
      service.createHotel({ hotel_id: 1, name: 'Hotel Paradise', location: 'New York', rooms: 100 });

      const result = service.createHotel({ hotel_id: 1, name: 'Hotel Sunshine', location: 'Los Angeles', rooms: 50 });

      expect(result.success).toBe(false);
      expect(result.error?.code).toBe(EntityErrorCode.DUPLICATE_KEY);
      const hotels = service.listHotels();
      expect(hotels).toHaveLength(1);
      expect(hotels[0].name).toBe('Hotel Paradise');
    });

    it('should reject a fractional room count without writing', () => {
      const result = service.createHotel({ hotel_id: 1, name: 'Hotel Paradise', location: 'New York', rooms: 1.5 });

      expect(result.success).toBe(false);
      expect(result.error?.code).toBe(EntityErrorCode.INVALID_RECORD);
      expect(result.error?.details).toEqual({
        issues: [{ field: 'rooms', message: 'Rooms must be an integer' }]
      });
      expect(storage.exists('hotels.json')).toBe(false);
    });

    it('should reject a negative room count', () => {
      const result = service.createHotel({ hotel_id: 1, name: 'Hotel Paradise', location: 'New York', rooms: -1 });

      expect(result.error?.code).toBe(EntityErrorCode.INVALID_RECORD);
    });
  });

  describe('deleteHotel', () => {
    it('should delete only the hotel with the given ID', () => {
      service.createHotel({ hotel_id: 1, name: 'Hotel Paradise', location: 'New York', rooms: 100 });
      service.createHotel({ hotel_id: 2, name: 'Hotel Sunshine', location: 'Los Angeles', rooms: 50 });

      const result = service.deleteHotel(1);

      expect(result).toEqual({ success: true, data: { removed: true } });
      const hotels = service.listHotels();
      expect(hotels).toHaveLength(1);
      expect(hotels[0].hotel_id).toBe(2);
    });

    it('should succeed silently for a missing hotel', () => {
      service.createHotel({ hotel_id: 1, name: 'Hotel Paradise', location: 'New York', rooms: 100 });

      const result = service.deleteHotel(999);

      expect(result).toEqual({ success: true, data: { removed: false } });
      expect(service.listHotels()).toHaveLength(1);
    });

    it('should keep stored records that do not match the schema', () => {
      const negativeRooms = { hotel_id: 2, name: 'Ocean View Resort', location: 'Miami', rooms: -1 };
      storage.write('hotels.json', [
        { hotel_id: 1, name: 'Hotel Paradise', location: 'New York', rooms: 100 },
        negativeRooms
      ]);

      service.deleteHotel(999);

      expect(storage.read('hotels.json')).toEqual([
        { hotel_id: 1, name: 'Hotel Paradise', location: 'New York', rooms: 100 },
        negativeRooms
      ]);
      expect(service.listHotels()).toEqual([
        { hotel_id: 1, name: 'Hotel Paradise', location: 'New York', rooms: 100 }
      ]);
    });

    it('should write an empty document when nothing existed', () => {
      service.deleteHotel(999);

      expect(storage.read('hotels.json')).toEqual([]);
    });
  });

  describe('displayHotel', () => {
    it('should return every field of the hotel', () => {
      service.createHotel({ hotel_id: 1, name: 'Hotel Paradise', location: 'New York', rooms: 100 });

      const result = service.displayHotel(1);

      expect(result.data).toEqual({ hotel_id: 1, name: 'Hotel Paradise', location: 'New York', rooms: 100 });
    });

    it('should report a missing hotel', () => {
      const result = service.displayHotel(5);

      expect(result.success).toBe(false);
      expect(result.error?.code).toBe(EntityErrorCode.NOT_FOUND);
      expect(result.error?.message).toBe('Hotel not found: 5');
    });
  });

  describe('modifyHotel', () => {
    it('should update the given fields and keep the others', () => {
      service.createHotel({ hotel_id: 1, name: 'Hotel Paradise', location: 'New York', rooms: 100 });

      const result = service.modifyHotel(1, { rooms: 150 });

      expect(result.success).toBe(true);
      expect(service.displayHotel(1).data).toEqual({
        hotel_id: 1,
        name: 'Hotel Paradise',
        location: 'New York',
        rooms: 150
      });
    });

    it('should update several fields at once', () => {
      service.createHotel({ hotel_id: 1, name: 'Hotel Paradise', location: 'New York', rooms: 100 });

      service.modifyHotel(1, { name: 'Updated Paradise', rooms: 150 });

      const hotels = service.listHotels();
      expect(hotels[0].name).toBe('Updated Paradise');
      expect(hotels[0].rooms).toBe(150);
    });

    it('should report a missing hotel but still write the document', () => {
      const result = service.modifyHotel(999, { name: 'Non-existent Hotel', rooms: 200 });

      expect(result.error?.code).toBe(EntityErrorCode.NOT_FOUND);
      expect(storage.exists('hotels.json')).toBe(true);
      expect(storage.read('hotels.json')).toEqual([]);
    });

    it('should not allow the hotel ID to change', () => {
      service.createHotel({ hotel_id: 1, name: 'Hotel Paradise', location: 'New York', rooms: 100 });
      const updates = { name: 'Renamed', hotel_id: 2 };

      const result = service.modifyHotel(1, updates);

      expect(result.error?.code).toBe(EntityErrorCode.INVALID_RECORD);
      expect(service.displayHotel(1).data?.name).toBe('Hotel Paradise');
    });

    it('should ignore fields given as undefined', () => {
      service.createHotel({ hotel_id: 1, name: 'Hotel Paradise', location: 'New York', rooms: 100 });

      const result = service.modifyHotel(1, { name: undefined });

      expect(result).toEqual({
        success: true,
        data: { hotel_id: 1, name: 'Hotel Paradise', location: 'New York', rooms: 100 }
      });

      service.createHotel({ hotel_id: 2, name: 'Hotel Sunshine', location: 'Los Angeles', rooms: 50 });
      expect(service.listHotels().map(hotel => hotel.hotel_id)).toEqual([1, 2]);
    });
  });
});
