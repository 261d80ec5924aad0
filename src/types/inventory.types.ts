/**
 * Inventory domain types
 */

export interface InventoryItemView {
  id: number;
  name: string;
  totalQuantity: number;
  allocatedQuantity: number;
  availableQuantity: number;
  description: string;
}

// Create item input
export interface CreateItemInput {
  name: string;
  totalQuantity: number;
  description: string;
}

// Partial edit of an item; totalQuantity goes through setTotalQuantity
export interface UpdateItemInput {
  name?: string;
  description?: string;
  totalQuantity?: number;
}

export interface AllocationChange {
  eventId: number;
  itemId: number;
  quantity: number;
  itemAllocatedQuantity: number;
  itemAvailableQuantity: number;
  eventAllocatedQuantity: number;
}

export interface InventoryReport {
  items: InventoryItemView[];
  totals: {
    totalQuantity: number;
    allocatedQuantity: number;
    availableQuantity: number;
  };
  allocationsByEvent: Array<{
    eventId: number;
    eventName: string;
    items: Array<{ itemId: number; name: string; quantity: number }>;
  }>;
}

// Item whose allocated quantity was corrected by a reconcile pass
export interface ReconciledItem {
  itemId: number;
  previousAllocatedQuantity: number;
  allocatedQuantity: number;
}

export interface ReconcileResult {
  adjustedItems: ReconciledItem[];
  orphanedAllocations: Array<{ eventId: number; itemId: number; quantity: number }>;
}
