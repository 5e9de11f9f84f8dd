/**
 * HTTP Server for the Hotel Reservation System
 * Runs on port 3080 unless PORT says otherwise
 */

import express, { Express, Request, Response, NextFunction } from 'express';
import { Server } from 'http';
import { createServices, Services } from './services';
import { JsonFileStorage } from './data/jsonFile';
import { createStores } from './data/store';
import { failure } from './services/results';
import { AppConfig, loadEnvironmentConfig } from './config';
import { EntityErrorCode, Result, reservationFiltersSchema } from './types';
import logger from './utils/logger';

/** Maps a result to its HTTP status */
function statusFor(result: Result<unknown>, successStatus: number = 200): number {
  if (result.success) {
    return successStatus;
  }

  switch (result.error?.code) {
    case EntityErrorCode.NOT_FOUND:
      return 404;
    case EntityErrorCode.DUPLICATE_KEY:
      return 409;
    default:
      return 400;
  }
}

function send(res: Response, result: Result<unknown>, successStatus?: number): void {
  res.status(statusFor(result, successStatus)).json(result);
}

/**
 * Runs the handler with the integer :id route parameter,
 * or answers 400 when the parameter is not an integer
 */
function withId(handler: (id: number, req: Request, res: Response) => void) {
  return (req: Request, res: Response) => {
    const id = Number(req.params.id);
    if (!Number.isInteger(id)) {
      send(res, failure(EntityErrorCode.INVALID_RECORD, `ID must be an integer: ${req.params.id}`));
      return;
    }
    handler(id, req, res);
  };
}

export function createApp(services: Services): Express {
  const app = express();

  // Middleware
  app.use(express.json());

  // Health check
  app.get('/health', (_req, res) => {
    res.json({ status: 'healthy' });
  });

  // ============== HOTEL ENDPOINTS ==============

  app.get('/api/v1/hotels', (_req, res) => {
    res.json({ success: true, data: services.hotels.listHotels() });
  });

  app.post('/api/v1/hotels', (req, res) => {
    send(res, services.hotels.createHotel(req.body), 201);
  });

  app.get('/api/v1/hotels/:id', withId((id, _req, res) => {
    send(res, services.hotels.displayHotel(id));
  }));

  app.patch('/api/v1/hotels/:id', withId((id, req, res) => {
    send(res, services.hotels.modifyHotel(id, req.body));
  }));

  app.delete('/api/v1/hotels/:id', withId((id, _req, res) => {
    send(res, services.hotels.deleteHotel(id));
  }));

  // ============== CUSTOMER ENDPOINTS ==============

  app.get('/api/v1/customers', (_req, res) => {
    res.json({ success: true, data: services.customers.listCustomers() });
  });

  app.post('/api/v1/customers', (req, res) => {
    send(res, services.customers.createCustomer(req.body), 201);
  });

  app.get('/api/v1/customers/:id', withId((id, _req, res) => {
    send(res, services.customers.displayCustomer(id));
  }));

  app.patch('/api/v1/customers/:id', withId((id, req, res) => {
    send(res, services.customers.modifyCustomer(id, req.body));
  }));

  app.delete('/api/v1/customers/:id', withId((id, _req, res) => {
    send(res, services.customers.deleteCustomer(id));
  }));

  // ============== RESERVATION ENDPOINTS ==============

  app.get('/api/v1/reservations', (req, res) => {
    const filters = reservationFiltersSchema.safeParse(req.query);
    if (!filters.success) {
      send(res, failure(EntityErrorCode.INVALID_RECORD, 'customer_id and hotel_id filters must be integers'));
      return;
    }
    res.json({ success: true, data: services.reservations.listReservations(filters.data) });
  });

  app.post('/api/v1/reservations', (req, res) => {
    send(res, services.reservations.createReservation(req.body), 201);
  });

  app.get('/api/v1/reservations/:id', withId((id, _req, res) => {
    send(res, services.reservations.displayReservation(id));
  }));

  app.patch('/api/v1/reservations/:id', withId((id, req, res) => {
    send(res, services.reservations.modifyReservation(id, req.body));
  }));

  app.delete('/api/v1/reservations/:id', withId((id, _req, res) => {
    send(res, services.reservations.cancelReservation(id));
  }));

  // Error handling middleware
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof SyntaxError) {
      send(res, failure(EntityErrorCode.INVALID_RECORD, 'Request body is not valid JSON'));
      return;
    }

    logger.error('Unhandled request error', { error: err.message, stack: err.stack });
    res.status(500).json({
      success: false,
      error: {
        code: 'INTERNAL_ERROR',
        message: 'An internal error occurred'
      }
    });
  });

  return app;
}

export function startServer(config: AppConfig): Server {
  logger.level = config.logLevel;
  const storage = new JsonFileStorage(config.dataDir);
  const services = createServices(createStores(storage, config.documents));
  const app = createApp(services);

  return app.listen(config.port, () => {
    logger.info(`Hotel Reservation System running on port ${config.port}`, {
      dataDir: config.dataDir
    });
  });
}

if (require.main === module) {
  startServer(loadEnvironmentConfig());
}
