import { z } from 'zod';
import { EventStatus } from '../types/event.types';
import { idParam, positiveInteger, recordText } from './common.validator';
import { isValidDate, isValidTime } from './schedule';

/**
 * Event validation schemas
 */

const date = recordText('Date').refine(isValidDate, 'Date must be YYYY-MM-DD (year 1900-2100)');
const time = recordText('Time').refine(isValidTime, 'Time must be HH:MM (24-hour)');

const eventParams = z.object({
  id: idParam('event ID'),
});

const eventFields = {
  name: recordText('Name'),
  date,
  time,
  location: recordText('Location'),
  description: recordText('Description'),
  category: recordText('Category'),
};

// Create event request schema
export const createEventSchema = z.object({
  body: z.object(eventFields),
});

// Partial edit; at least one field
export const updateEventSchema = z.object({
  params: eventParams,
  body: z
    .object(eventFields)
    .partial()
    .refine((body) => Object.keys(body).length > 0, 'At least one field must be provided'),
});

export const updateEventStatusSchema = z.object({
  params: eventParams,
  body: z.object({
    status: z.nativeEnum(EventStatus, {
      errorMap: () => ({ message: 'Status must be UPCOMING, ONGOING, COMPLETED or CANCELED' }),
    }),
  }),
});

// Get / delete / report by event ID
export const eventIdSchema = z.object({
  params: eventParams,
});

export const searchEventsSchema = z.object({
  query: z.object({
    q: z.string().trim().min(1, 'Search term is required'),
  }),
});

// Allocate or deallocate inventory
export const allocationSchema = z.object({
  params: eventParams,
  body: z.object({
    item_id: positiveInteger('Item ID'),
    quantity: positiveInteger('Quantity'),
  }),
});

export const registrationSchema = z.object({
  params: eventParams,
  body: z.object({
    contact_info: recordText('Contact info'),
  }),
});

export const checkInSchema = z.object({
  params: eventParams,
  body: z.object({
    attendee_id: positiveInteger('Attendee ID'),
  }),
});
