import { Request, Response } from 'express';
import { InventoryService } from '../services/inventory.service';
import { ReportService } from '../services/report.service';
import { parseRequest } from '../middleware/validation.middleware';
import { createItemSchema, getItemSchema, updateItemSchema } from '../validators/inventory.validator';
import { allocationSchema } from '../validators/event.validator';
import { createSuccessResponse } from '../utils/response-factory';
import { asyncHandler } from '../utils/async-handler';

/**
 * Inventory Controller
 *
 * HTTP request handlers for inventory items and event allocations
 */
export class InventoryController {
  constructor(
    private inventoryService: InventoryService,
    private reportService: ReportService
  ) {}

  /**
   * POST /v1/inventory
   * Add a new inventory item
   */
  createItem = asyncHandler((req: Request, res: Response) => {
    const { name, total_quantity, description } = parseRequest(createItemSchema, req).body;

    const item = this.inventoryService.createItem({
      name,
      totalQuantity: total_quantity,
      description,
    });

    res.status(201).json(createSuccessResponse(item));
  });

  /**
   * GET /v1/inventory
   */
  listItems = asyncHandler((_req: Request, res: Response) => {
    res.status(200).json(createSuccessResponse(this.inventoryService.listItems()));
  });

  /**
   * GET /v1/inventory/:id
   * Get item with availability breakdown
   */
  getItem = asyncHandler((req: Request, res: Response) => {
    const { params } = parseRequest(getItemSchema, req);

    res.status(200).json(createSuccessResponse(this.inventoryService.getItem(params.id)));
  });

  /**
   * PATCH /v1/inventory/:id
   */
  updateItem = asyncHandler((req: Request, res: Response) => {
    const { params, body } = parseRequest(updateItemSchema, req);

    const item = this.inventoryService.updateItem(params.id, {
      name: body.name,
      description: body.description,
      totalQuantity: body.total_quantity,
    });

    res.status(200).json(createSuccessResponse(item, 'Inventory item updated'));
  });

  /**
   * GET /v1/inventory/report
   */
  getReport = asyncHandler((_req: Request, res: Response) => {
    res.status(200).json(createSuccessResponse(this.reportService.inventoryReport()));
  });

  /**
   * POST /v1/events/:id/allocations
   */
  allocate = asyncHandler((req: Request, res: Response) => {
    const { params, body } = parseRequest(allocationSchema, req);

    const change = this.inventoryService.allocateToEvent(params.id, body.item_id, body.quantity);

    res
      .status(200)
      .json(createSuccessResponse(change, `Allocated ${change.quantity} to event ${params.id}`));
  });

  /**
   * POST /v1/events/:id/deallocations
   * The response carries the quantity actually released
   */
  deallocate = asyncHandler((req: Request, res: Response) => {
    const { params, body } = parseRequest(allocationSchema, req);

    const change = this.inventoryService.deallocateFromEvent(params.id, body.item_id, body.quantity);

    res
      .status(200)
      .json(createSuccessResponse(change, `Released ${change.quantity} from event ${params.id}`));
  });
}
