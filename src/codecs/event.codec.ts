import { z } from 'zod';
import { Event } from '../models/event.model';
import { EventStatus } from '../types/event.types';
import { Result, succeed } from '../types/result.types';
import {
  codeField,
  decodeIdList,
  decodeQuantityMap,
  encodeFields,
  encodeIdList,
  encodeQuantityMap,
  idField,
  lineEncoder,
  optionalTextField,
  parseFields,
  textField,
} from './fields';

/**
 * Event record codec
 *
 * id,name,date,time,location,description,category,statusCode,attendeeIds,allocations
 *
 * attendeeIds is `3;7;12`, allocations is `2:5;9:1`; either may be empty or
 * missing entirely.
 */

const EVENT_FIELDS = [
  'id',
  'name',
  'date',
  'time',
  'location',
  'description',
  'category',
  'status',
  'attendeeIds',
  'allocations',
] as const;

// Index is the persisted status code
export const EVENT_STATUS_CODES: readonly EventStatus[] = [
  EventStatus.UPCOMING,
  EventStatus.ONGOING,
  EventStatus.COMPLETED,
  EventStatus.CANCELED,
];

const statusField = codeField.transform((code, ctx) => {
  const status = EVENT_STATUS_CODES[code];
  if (status === undefined) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unknown status code ${code}` });
    return z.NEVER;
  }
  return status;
});

const eventRecord = z.object({
  id: idField,
  name: textField,
  date: textField,
  time: textField,
  location: textField,
  description: textField,
  category: textField,
  status: statusField,
  attendeeIds: optionalTextField,
  allocations: optionalTextField,
});

export function decodeEvent(line: string): Result<Event> {
  const parsed = parseFields(eventRecord, EVENT_FIELDS, line);
  if (!parsed.ok) return parsed;

  const record = parsed.value;
  const event = new Event(
    record.id,
    record.name,
    record.date,
    record.time,
    record.location,
    record.description,
    record.category,
    record.status
  );

  const context = `event ${record.id}`;
  for (const attendeeId of decodeIdList(record.attendeeIds, context)) {
    event.addAttendee(attendeeId);
  }
  for (const [itemId, quantity] of decodeQuantityMap(record.allocations, context)) {
    event.allocateInventoryItem(itemId, quantity);
  }

  return succeed(event);
}

export function encodeEvent(event: Event): string {
  return encodeFields([
    event.id,
    event.name,
    event.date,
    event.time,
    event.location,
    event.description,
    event.category,
    EVENT_STATUS_CODES.indexOf(event.status),
    encodeIdList(event.attendees),
    encodeQuantityMap(event.allocations),
  ]);
}

export const encodeEvents = lineEncoder(encodeEvent);
