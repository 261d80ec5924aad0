import { Catalog } from '../repositories/catalog.repository';
import {
  AllocationChange,
  CreateItemInput,
  InventoryItemView,
  UpdateItemInput,
} from '../types/inventory.types';
import { AppError, ErrorCode } from '../types/error.types';
import { unwrap } from '../types/result.types';
import { logger } from '../config/logger';

/**
 * Inventory Service
 *
 * Business logic for inventory items and their allocation to events
 */
export class InventoryService {
  constructor(private catalog: Catalog) {}

  /**
   * Add a new inventory item
   */
  createItem(input: CreateItemInput): InventoryItemView {
    logger.info('Creating inventory item', input);

    const item = unwrap(this.catalog.addItem(input));

    logger.info('Inventory item created successfully', { itemId: item.id });
    return item.toView();
  }

  /**
   * Get item by ID with availability breakdown
   */
  getItem(id: number): InventoryItemView {
    logger.debug('Getting inventory item', { id });

    const item = this.catalog.findItem(id);

    if (!item) {
      throw new AppError(ErrorCode.ITEM_NOT_FOUND, `Inventory item with ID ${id} not found`, 404);
    }

    return item.toView();
  }

  listItems(): InventoryItemView[] {
    return this.catalog.listItems().map((item) => item.toView());
  }

  /**
   * Edit name, description or total quantity.
   *
   * The total cannot drop below what events currently hold; in that case
   * nothing is changed and a 409 is returned.
   */
  updateItem(id: number, input: UpdateItemInput): InventoryItemView {
    logger.info('Updating inventory item', { id, ...input });

    return unwrap(this.catalog.updateItem(id, input)).toView();
  }

  /**
   * Allocate stock to an event
   *
   * Business rules:
   * - Quantity must be positive
   * - Quantity cannot exceed the item's available stock
   * - Repeated allocations to the same event accumulate
   */
  allocateToEvent(eventId: number, itemId: number, quantity: number): AllocationChange {
    logger.info('Allocating inventory to event', { eventId, itemId, quantity });

    return unwrap(this.catalog.allocateToEvent(eventId, itemId, quantity));
  }

  /**
   * Return stock from an event
   *
   * Requests above what the event holds release only what it holds; the
   * response carries the released amount.
   */
  deallocateFromEvent(eventId: number, itemId: number, quantity: number): AllocationChange {
    logger.info('Deallocating inventory from event', { eventId, itemId, quantity });

    return unwrap(this.catalog.deallocateFromEvent(eventId, itemId, quantity));
  }
}
