import { z } from 'zod';
import { idParam, positiveInteger, recordText } from './common.validator';

/**
 * Inventory validation schemas
 */

const itemParams = z.object({
  id: idParam('item ID'),
});

// Create item request schema
export const createItemSchema = z.object({
  body: z.object({
    name: recordText('Name'),
    total_quantity: positiveInteger('Total quantity'),
    description: recordText('Description'),
  }),
});

// Update item request schema; total may shrink to zero but not below what is allocated
export const updateItemSchema = z.object({
  params: itemParams,
  body: z
    .object({
      name: recordText('Name').optional(),
      description: recordText('Description').optional(),
      total_quantity: z
        .number({ invalid_type_error: 'Total quantity must be a number' })
        .int('Total quantity must be an integer')
        .max(Number.MAX_SAFE_INTEGER, 'Total quantity is too large')
        .optional(),
    })
    .refine((body) => Object.keys(body).length > 0, 'At least one field must be provided'),
});

// Get item by ID schema
export const getItemSchema = z.object({
  params: itemParams,
});
