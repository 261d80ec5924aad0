import { z } from 'zod';
import { COLLECTION_NAMES } from '../repositories/catalog.repository';

/**
 * Maintenance validation schemas
 */

export const exportCollectionSchema = z.object({
  params: z.object({
    collection: z.enum(COLLECTION_NAMES, {
      errorMap: () => ({ message: `Collection must be one of ${COLLECTION_NAMES.join(', ')}` }),
    }),
  }),
});
