/**
 * Walks through the main operations against the configured documents
 * and prints each document as it changes. Run `npm run seed` first to
 * start from the sample data.
 *
 * Usage: npm run validate
 */

import { loadEnvironmentConfig } from '../config';
import { JsonFileStorage } from '../data/jsonFile';
import logger from '../utils/logger';
import { createStores } from '../data/store';
import { createServices } from '../services';
import { Result } from '../types';

const config = loadEnvironmentConfig();
logger.level = config.logLevel;
const services = createServices(createStores(new JsonFileStorage(config.dataDir), config.documents));

function printDocuments(heading: string): void {
  console.log(`\n${heading}`);
  console.log('Hotels:', JSON.stringify(services.hotels.listHotels()));
  console.log('Customers:', JSON.stringify(services.customers.listCustomers()));
  console.log('Reservations:', JSON.stringify(services.reservations.listReservations()));
}

function report(step: string, result: Result<unknown>): void {
  if (result.success) {
    console.log(`${step}: ok`);
  } else {
    console.log(`${step}: ${result.error?.code} - ${result.error?.message}`);
  }
}

printDocuments('Initial data');

report(
  'Creating hotel 3',
  services.hotels.createHotel({ hotel_id: 3, name: 'Mountain Lodge', location: 'Denver', rooms: 50 })
);
report(
  'Creating customer 3',
  services.customers.createCustomer({ customer_id: 3, name: 'Alice Johnson', email: 'alice@example.com' })
);
report(
  'Creating reservation 3',
  services.reservations.createReservation({ reservation_id: 3, customer_id: 3, hotel_id: 3, room_number: 25 })
);
printDocuments('After creation');

report('Cancelling reservation 1', services.reservations.cancelReservation(1));
printDocuments('After cancellation');
