import { z } from 'zod';
import { Attendee, UNLINKED_USER_ID } from '../models/attendee.model';
import { Result, succeed } from '../types/result.types';
import { countField, encodeFields, idField, lineEncoder, parseFields, textField } from './fields';

/**
 * Attendee record codec
 *
 * id,name,contactInfo,eventId,checkedIn(0|1)[,userId]
 *
 * userId is written only for attendees owned by a user account; records
 * without it decode as unlinked.
 */

const ATTENDEE_FIELDS = ['id', 'name', 'contactInfo', 'eventId', 'checkedIn', 'userId'] as const;

const attendeeRecord = z.object({
  id: idField,
  name: textField,
  contactInfo: textField,
  eventId: countField,
  checkedIn: textField.transform((value) => value.trim() === '1'),
  userId: countField.optional(),
});

export function decodeAttendee(line: string): Result<Attendee> {
  const parsed = parseFields(attendeeRecord, ATTENDEE_FIELDS, line);
  if (!parsed.ok) return parsed;

  const { id, name, contactInfo, eventId, checkedIn, userId } = parsed.value;
  return succeed(new Attendee(id, name, contactInfo, eventId, checkedIn, userId ?? UNLINKED_USER_ID));
}

export function encodeAttendee(attendee: Attendee): string {
  const fields: Array<string | number> = [
    attendee.id,
    attendee.name,
    attendee.contactInfo,
    attendee.eventIdRegisteredFor,
    attendee.isCheckedIn ? 1 : 0,
  ];
  if (attendee.userId !== UNLINKED_USER_ID) {
    fields.push(attendee.userId);
  }
  return encodeFields(fields);
}

export const encodeAttendees = lineEncoder(encodeAttendee);
