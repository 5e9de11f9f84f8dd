/**
 * Tests for the JSON file storage adapter
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import { JsonFileStorage } from './jsonFile';
import { EntityErrorCode } from '../types';
import logger from '../utils/logger';

describe('JsonFileStorage', () => {
  let dataDir: string;
  let storage: JsonFileStorage;

  beforeEach(() => {
    dataDir = fs.mkdtempSync(path.join(os.tmpdir(), 'json-storage-'));
    storage = new JsonFileStorage(dataDir);
  });

  afterEach(() => {
    jest.restoreAllMocks();
    fs.rmSync(dataDir, { recursive: true, force: true });
  });

  describe('read', () => {
    it('should return an empty array for a missing document', () => {
      expect(storage.read('hotels.json')).toEqual([]);
    });

    it('should return the records in the order they were written', () => {
      const records = [
        { hotel_id: 2, name: 'Ocean View Resort', location: 'Miami', rooms: 200 },
        { hotel_id: 1, name: 'Hotel Paradise', location: 'New York', rooms: 100 }
      ];

      storage.write('hotels.json', records);

      expect(storage.read('hotels.json')).toEqual(records);
    });

    it('should treat undecodable content as empty and log it', () => {
      const errorSpy = jest.spyOn(logger, 'error');
      fs.writeFileSync(path.join(dataDir, 'hotels.json'), '{ not json', 'utf-8');

      expect(storage.read('hotels.json')).toEqual([]);
      expect(errorSpy).toHaveBeenCalledWith(
        'Invalid data in hotels.json',
        expect.objectContaining({ code: EntityErrorCode.CORRUPT_STORAGE })
      );
    });

    it('should treat a JSON value that is not an array as empty', () => {
      const errorSpy = jest.spyOn(logger, 'error');
      fs.writeFileSync(path.join(dataDir, 'hotels.json'), '{"hotel_id": 1}', 'utf-8');

      expect(storage.read('hotels.json')).toEqual([]);
      expect(errorSpy).toHaveBeenCalledWith('Invalid data in hotels.json', {
        code: EntityErrorCode.CORRUPT_STORAGE,
        reason: 'document is not an array'
      });
    });
  });

  describe('write', () => {
    it('should replace the previous content of the document', () => {
      storage.write('customers.json', [{ customer_id: 1, name: 'John Doe', email: 'john@example.com' }]);
      storage.write('customers.json', []);

      expect(storage.read('customers.json')).toEqual([]);
    });

    it('should write the records with four-space indentation', () => {
      const records = [{ customer_id: 1, name: 'John Doe', email: 'john@example.com' }];

      storage.write('customers.json', records);

      const content = fs.readFileSync(path.join(dataDir, 'customers.json'), 'utf-8');
      expect(content).toBe(
        '[\n    {\n        "customer_id": 1,\n        "name": "John Doe",\n        "email": "john@example.com"\n    }\n]'
      );
    });

    it('should create the data directory when it does not exist', () => {
      const nested = new JsonFileStorage(path.join(dataDir, 'nested', 'data'));

      nested.write('reservations.json', []);

      expect(nested.exists('reservations.json')).toBe(true);
      expect(fs.existsSync(path.join(dataDir, 'nested', 'data', 'reservations.json'))).toBe(true);
    });
  });

  describe('exists', () => {
    it('should report whether the document has been written', () => {
      expect(storage.exists('hotels.json')).toBe(false);

      storage.write('hotels.json', []);

      expect(storage.exists('hotels.json')).toBe(true);
    });
  });
});
