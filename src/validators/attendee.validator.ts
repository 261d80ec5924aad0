import { z } from 'zod';
import { idParam, recordText } from './common.validator';

/**
 * Attendee validation schemas
 */

export const listAttendeesSchema = z.object({
  query: z.object({
    event_id: idParam('event ID').optional(),
  }),
});

export const updateContactSchema = z.object({
  body: z.object({
    contact_info: recordText('Contact info'),
  }),
});
