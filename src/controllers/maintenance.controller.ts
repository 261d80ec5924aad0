import { Request, Response } from 'express';
import { MaintenanceService } from '../services/maintenance.service';
import { parseRequest } from '../middleware/validation.middleware';
import { exportCollectionSchema } from '../validators/maintenance.validator';
import { createSuccessResponse } from '../utils/response-factory';
import { asyncHandler } from '../utils/async-handler';

/**
 * Maintenance Controller
 *
 * HTTP request handlers for maintenance endpoints
 */
export class MaintenanceController {
  constructor(private maintenanceService: MaintenanceService) {}

  /**
   * POST /v1/maintenance/reconcile
   * Rebuild item allocation counters from the event ledgers
   */
  reconcile = asyncHandler((_req: Request, res: Response) => {
    const result = this.maintenanceService.reconcile();

    res
      .status(200)
      .json(
        createSuccessResponse(result, `Adjusted ${result.adjustedItems.length} inventory items`)
      );
  });

  /**
   * POST /v1/maintenance/export/:collection
   */
  exportCollection = asyncHandler((req: Request, res: Response) => {
    const { params } = parseRequest(exportCollectionSchema, req);

    const result = this.maintenanceService.exportCollection(params.collection);

    res
      .status(200)
      .json(
        createSuccessResponse(
          result,
          `Exported ${result.recordCount} ${params.collection} records to ${result.documentName}`
        )
      );
  });
}
