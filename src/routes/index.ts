import { Router } from 'express';
import { Services } from '../services';
import { createUserRoutes } from './v1/users.routes';
import { createEventRoutes } from './v1/events.routes';
import { createInventoryRoutes } from './v1/inventory.routes';
import { createAttendeeRoutes } from './v1/attendees.routes';
import { createMaintenanceRoutes } from './v1/maintenance.routes';
import { HealthCheckResponse } from '../types/api.types';

/**
 * API Routes Aggregator
 */
export function createRoutes(services: Services): Router {
  const router = Router();

  // v1 routes
  router.use('/v1/users', createUserRoutes(services.users));
  router.use('/v1/events', createEventRoutes(services));
  router.use('/v1/inventory', createInventoryRoutes(services));
  router.use('/v1/attendees', createAttendeeRoutes(services));
  router.use('/v1/maintenance', createMaintenanceRoutes(services));

  // Health check endpoint
  router.get('/health', (_req, res) => {
    const health: HealthCheckResponse = {
      status: 'healthy',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    };
    res.status(200).json(health);
  });

  // API version info
  router.get('/v1', (_req, res) => {
    res.status(200).json({
      version: '1.0.0',
      api: 'Event Inventory API',
    });
  });

  return router;
}
