import { ErrorCode } from '../types/error.types';
import { InventoryItemView } from '../types/inventory.types';
import { Result, fail, succeed } from '../types/result.types';

/**
 * Inventory Item
 *
 * Stock-keeping record. Keeps 0 <= allocatedQuantity <= totalQuantity across
 * every mutation; a rejected mutation leaves the item untouched.
 */
export class InventoryItem {
  constructor(
    public readonly id: number,
    private _name: string,
    private _totalQuantity: number,
    private _allocatedQuantity: number,
    private _description: string
  ) {}

  get name(): string {
    return this._name;
  }

  get description(): string {
    return this._description;
  }

  get totalQuantity(): number {
    return this._totalQuantity;
  }

  get allocatedQuantity(): number {
    return this._allocatedQuantity;
  }

  get availableQuantity(): number {
    return this._totalQuantity - this._allocatedQuantity;
  }

  allocate(quantity: number): Result<number> {
    if (!Number.isSafeInteger(quantity) || quantity <= 0) {
      return fail(ErrorCode.INVALID_QUANTITY, 'Allocation quantity must be a positive integer', {
        quantity,
      });
    }

    if (quantity > this.availableQuantity) {
      return fail(
        ErrorCode.INSUFFICIENT_AVAILABLE,
        `Not enough '${this._name}' available. Available: ${this.availableQuantity}`,
        { requested: quantity, available: this.availableQuantity }
      );
    }

    this._allocatedQuantity += quantity;
    return succeed(this._allocatedQuantity);
  }

  deallocate(quantity: number): Result<number> {
    if (!Number.isSafeInteger(quantity) || quantity <= 0) {
      return fail(ErrorCode.INVALID_QUANTITY, 'Deallocation quantity must be a positive integer', {
        quantity,
      });
    }

    if (quantity > this._allocatedQuantity) {
      return fail(
        ErrorCode.OVER_DEALLOCATION,
        `Cannot deallocate ${quantity} of '${this._name}'. Allocated: ${this._allocatedQuantity}`,
        { requested: quantity, allocated: this._allocatedQuantity }
      );
    }

    this._allocatedQuantity -= quantity;
    return succeed(this._allocatedQuantity);
  }

  setTotalQuantity(newTotal: number): Result<number> {
    if (!Number.isSafeInteger(newTotal)) {
      return fail(ErrorCode.INVALID_QUANTITY, 'Total quantity must be an integer', { newTotal });
    }
    if (newTotal < 0) {
      return fail(ErrorCode.NEGATIVE_QUANTITY, 'Total quantity cannot be negative', { newTotal });
    }

    if (newTotal < this._allocatedQuantity) {
      return fail(
        ErrorCode.BELOW_ALLOCATED,
        `New total quantity (${newTotal}) cannot be less than allocated (${this._allocatedQuantity})`,
        { newTotal, allocated: this._allocatedQuantity }
      );
    }

    this._totalQuantity = newTotal;
    return succeed(this._totalQuantity);
  }

  rename(name: string): void {
    this._name = name;
  }

  describe(description: string): void {
    this._description = description;
  }

  /**
   * Replace the allocated quantity while rebuilding it from event ledgers.
   * Only the catalog's reconcile pass calls this.
   */
  resetAllocated(quantity: number = 0): void {
    this._allocatedQuantity = quantity;
  }

  toView(): InventoryItemView {
    return {
      id: this.id,
      name: this._name,
      totalQuantity: this._totalQuantity,
      allocatedQuantity: this._allocatedQuantity,
      availableQuantity: this.availableQuantity,
      description: this._description,
    };
  }
}
