/**
 * Creates the hotel, customer and reservation documents with sample
 * data. Documents that already exist are left untouched.
 *
 * Usage: npm run seed
 */

import { loadEnvironmentConfig } from '../config';
import { JsonFileStorage } from '../data/jsonFile';
import logger from '../utils/logger';
import { seedSampleData } from '../data/seed';

const config = loadEnvironmentConfig();
logger.level = config.logLevel;
const outcomes = seedSampleData(new JsonFileStorage(config.dataDir), config.documents);

for (const { document, created } of outcomes) {
  console.log(created ? `Created ${document} with sample data.` : `${document} already exists.`);
}
