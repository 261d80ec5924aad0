import { Router } from 'express';
import { InventoryController } from '../../controllers/inventory.controller';
import { Services } from '../../services';
import { authenticate, requireAdmin } from '../../middleware/auth.middleware';
import { validate } from '../../middleware/validation.middleware';
import {
  createItemSchema,
  getItemSchema,
  updateItemSchema,
} from '../../validators/inventory.validator';

/**
 * Inventory routes (v1)
 */
export function createInventoryRoutes(services: Services): Router {
  const router = Router();
  const inventoryController = new InventoryController(services.inventory, services.reports);

  router.use(authenticate(services.users));

  /**
   * @swagger
   * /v1/inventory:
   *   get:
   *     summary: List inventory items
   *     tags: [Inventory]
   *     responses:
   *       200:
   *         description: All items with availability
   *   post:
   *     summary: Add an inventory item (admin)
   *     tags: [Inventory]
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required: [name, total_quantity, description]
   *             properties:
   *               name:
   *                 type: string
   *               total_quantity:
   *                 type: integer
   *                 minimum: 1
   *               description:
   *                 type: string
   *     responses:
   *       201:
   *         description: Item created
   */
  router.get('/', inventoryController.listItems);
  router.post('/', requireAdmin, validate(createItemSchema), inventoryController.createItem);

  /**
   * @swagger
   * /v1/inventory/report:
   *   get:
   *     summary: Inventory report (admin)
   *     tags: [Reports]
   *     responses:
   *       200:
   *         description: Stock per item, totals and allocations per event
   */
  router.get('/report', requireAdmin, inventoryController.getReport);

  /**
   * @swagger
   * /v1/inventory/{id}:
   *   get:
   *     summary: Get item with availability breakdown
   *     tags: [Inventory]
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: integer
   *     responses:
   *       200:
   *         description: Item retrieved successfully
   *         content:
   *           application/json:
   *             schema:
   *               $ref: '#/components/schemas/InventoryItem'
   *       404:
   *         description: Item not found
   *   patch:
   *     summary: Edit an item (admin)
   *     tags: [Inventory]
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: integer
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             properties:
   *               name:
   *                 type: string
   *               description:
   *                 type: string
   *               total_quantity:
   *                 type: integer
   *     responses:
   *       200:
   *         description: Item updated
   *       409:
   *         description: Total would drop below the allocated quantity
   */
  router.get('/:id', validate(getItemSchema), inventoryController.getItem);
  router.patch('/:id', requireAdmin, validate(updateItemSchema), inventoryController.updateItem);

  return router;
}
