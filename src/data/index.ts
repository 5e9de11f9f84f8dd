export { JsonFileStorage } from './jsonFile';
export { BaseStore, HotelStore, CustomerStore, ReservationStore, Stores, createStores } from './store';
export { seedSampleData, SeedOutcome, SAMPLE_HOTELS, SAMPLE_CUSTOMERS, SAMPLE_RESERVATIONS } from './seed';
