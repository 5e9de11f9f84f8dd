/**
 * Hotel Reservation System
 *
 * Hotels, customers and reservations kept in three JSON documents:
 * - Storage: whole-document JSON reads and writes
 * - Stores: per-kind load/save and lookups by primary key
 * - Services: create, delete, display and modify with explicit results
 */

export * from './types';
export * from './data';
export * from './services';
export { loadConfig, loadEnvironmentConfig, AppConfig, LogLevel } from './config';
export { createApp, startServer } from './server';
