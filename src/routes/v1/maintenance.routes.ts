import { Router } from 'express';
import { MaintenanceController } from '../../controllers/maintenance.controller';
import { Services } from '../../services';
import { authenticate, requireAdmin } from '../../middleware/auth.middleware';
import { validate } from '../../middleware/validation.middleware';
import { exportCollectionSchema } from '../../validators/maintenance.validator';

/**
 * Maintenance routes (v1)
 */
export function createMaintenanceRoutes(services: Services): Router {
  const router = Router();
  const maintenanceController = new MaintenanceController(services.maintenance);

  router.use(authenticate(services.users), requireAdmin);

  /**
   * @swagger
   * /v1/maintenance/reconcile:
   *   post:
   *     summary: Rebuild allocation counters from the event ledgers
   *     description: |
   *       Sets every item's allocated quantity to the sum held by events.
   *       Ledger entries naming unknown items are reported and left in place.
   *     tags: [Maintenance]
   *     responses:
   *       200:
   *         description: Reconcile complete
   */
  router.post('/reconcile', maintenanceController.reconcile);

  /**
   * @swagger
   * /v1/maintenance/export/{collection}:
   *   post:
   *     summary: Copy a collection to <collection>_export.txt
   *     tags: [Maintenance]
   *     parameters:
   *       - in: path
   *         name: collection
   *         required: true
   *         schema:
   *           type: string
   *           enum: [users, events, attendees, inventory]
   *     responses:
   *       200:
   *         description: Collection exported
   */
  router.post('/export/:collection', validate(exportCollectionSchema), maintenanceController.exportCollection);

  return router;
}
