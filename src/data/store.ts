/**
 * JSON Document Stores
 *
 * One store per record kind, each bound to a single document.
 * Every call loads the document fresh and every mutation rewrites it whole;
 * nothing is cached between calls.
 */

import { z } from 'zod';
import {
  RecordId,
  Hotel,
  Customer,
  Reservation,
  DocumentNames,
  EntityErrorCode,
  hotelSchema,
  customerSchema,
  reservationSchema
} from '../types';
import { JsonFileStorage } from './jsonFile';
import logger from '../utils/logger';

/** Generic store interface */
interface Store<T> {
  getById(id: RecordId): T | undefined;
  getAll(): T[];
  create(item: T): T | undefined;
  update(id: RecordId, updates: Partial<T>): T | undefined;
  delete(id: RecordId): boolean;
}

/**
 * One element of a loaded document. raw is what was read and is what gets
 * written back, so records a mutation does not touch keep their exact content.
 * record is absent when the element does not match the schema.
 */
interface DocumentEntry<T> {
  raw: unknown;
  record?: T;
}

/** Base document store with common functionality */
export abstract class BaseStore<T extends object> implements Store<T> {
  protected abstract readonly schema: z.ZodType<T>;
  protected abstract readonly keyField: string;

  constructor(
    protected readonly storage: JsonFileStorage,
    readonly documentName: string
  ) {}

  /** Primary key of a stored element, if it has an integer one */
  keyOf(item: unknown): RecordId | undefined {
    const parsed = z.object({ [this.keyField]: z.number().int() }).safeParse(item);
    return parsed.success ? parsed.data[this.keyField] : undefined;
  }

  /**
   * Loads the document element by element. Elements that do not match the
   * schema are logged and hidden from reads, but kept for the next write.
   */
  protected loadEntries(): DocumentEntry<T>[] {
    return this.storage.read(this.documentName).map((raw, index) => {
      const parsed = this.schema.safeParse(raw);
      if (parsed.success) {
        return { raw, record: parsed.data };
      }

      logger.error(`Invalid record in ${this.documentName}`, {
        code: EntityErrorCode.CORRUPT_STORAGE,
        index,
        issues: parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
      });
      return { raw };
    });
  }

  protected saveEntries(entries: readonly DocumentEntry<T>[]): void {
    this.storage.write(
      this.documentName,
      entries.map(entry => entry.raw)
    );
  }

  /** Appends the item without checking its key */
  protected append(item: T): T {
    const entries = this.loadEntries();
    entries.push({ raw: item, record: item });
    this.saveEntries(entries);
    return item;
  }

  getById(id: RecordId): T | undefined {
    return this.getAll().find(item => this.keyOf(item) === id);
  }

  getAll(): T[] {
    const records: T[] = [];
    for (const entry of this.loadEntries()) {
      if (entry.record) {
        records.push(entry.record);
      }
    }
    return records;
  }

  /**
   * Appends the item and rewrites the document.
   * Returns undefined without writing if the key is already taken.
   */
  create(item: T): T | undefined {
    const key = this.keyOf(item);
    if (this.loadEntries().some(entry => this.keyOf(entry.raw) === key)) {
      return undefined;
    }
    return this.append(item);
  }

  /**
   * Merges the defined fields of updates into the first valid item with the
   * key. The document is rewritten even when no item matches.
   * @throws Error if the merged item no longer matches the schema
   */
  update(id: RecordId, updates: Partial<T>): T | undefined {
    const entries = this.loadEntries();
    const entry = entries.find(e => e.record !== undefined && this.keyOf(e.record) === id);

    if (!entry?.record) {
      this.saveEntries(entries);
      return undefined;
    }

    const defined = Object.fromEntries(
      Object.entries(updates).filter(([, value]) => value !== undefined)
    );
    const merged = this.schema.safeParse({ ...entry.record, ...defined });
    if (!merged.success) {
      throw new Error(`Update of ${id} in ${this.documentName} does not produce a valid record`);
    }

    entry.raw = merged.data;
    entry.record = merged.data;
    this.saveEntries(entries);
    return merged.data;
  }

  /** Removes every element with the key; the document is rewritten either way */
  delete(id: RecordId): boolean {
    const entries = this.loadEntries();
    const remaining = entries.filter(entry => this.keyOf(entry.raw) !== id);
    this.saveEntries(remaining);
    return remaining.length !== entries.length;
  }

  count(): number {
    return this.getAll().length;
  }
}

/** Hotel document store */
export class HotelStore extends BaseStore<Hotel> {
  protected readonly schema = hotelSchema;
  protected readonly keyField = 'hotel_id';
}

/** Customer document store */
export class CustomerStore extends BaseStore<Customer> {
  protected readonly schema = customerSchema;
  protected readonly keyField = 'customer_id';
}

/** Reservation document store; reservation ids are not forced unique */
export class ReservationStore extends BaseStore<Reservation> {
  protected readonly schema = reservationSchema;
  protected readonly keyField = 'reservation_id';

  /** Appends without checking whether reservation_id is already used */
  create(reservation: Reservation): Reservation {
    return this.append(reservation);
  }
}

export interface Stores {
  hotels: HotelStore;
  customers: CustomerStore;
  reservations: ReservationStore;
}

/** Builds the three stores over one storage handle */
export function createStores(storage: JsonFileStorage, documents: DocumentNames): Stores {
  return {
    hotels: new HotelStore(storage, documents.hotels),
    customers: new CustomerStore(storage, documents.customers),
    reservations: new ReservationStore(storage, documents.reservations)
  };
}
