import { z } from 'zod';
import { InventoryItem } from '../models/inventory-item.model';
import { Result, succeed } from '../types/result.types';
import {
  countField,
  encodeFields,
  idField,
  lineEncoder,
  optionalTextField,
  parseFields,
  textField,
} from './fields';

/**
 * Inventory record codec
 *
 * id,name,totalQuantity,allocatedQuantity,description
 *
 * The description takes the rest of the line. The persisted allocated
 * quantity is only a hint: the catalog rebuilds it from event ledgers on load.
 */

const INVENTORY_FIELDS = ['id', 'name', 'totalQuantity', 'allocatedQuantity', 'description'] as const;

const inventoryRecord = z.object({
  id: idField,
  name: textField,
  totalQuantity: countField,
  allocatedQuantity: countField,
  description: optionalTextField,
});

export function decodeInventoryItem(line: string): Result<InventoryItem> {
  const parsed = parseFields(inventoryRecord, INVENTORY_FIELDS, line);
  if (!parsed.ok) return parsed;

  const { id, name, totalQuantity, allocatedQuantity, description } = parsed.value;
  return succeed(new InventoryItem(id, name, totalQuantity, allocatedQuantity, description));
}

export function encodeInventoryItem(item: InventoryItem): string {
  return encodeFields([
    item.id,
    item.name,
    item.totalQuantity,
    item.allocatedQuantity,
    item.description,
  ]);
}

export const encodeInventory = lineEncoder(encodeInventoryItem);
