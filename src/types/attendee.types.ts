/**
 * Attendee domain types
 */

export interface AttendeeView {
  id: number;
  name: string;
  contactInfo: string;
  eventId: number;
  userId: number;
  isCheckedIn: boolean;
}

export interface RegistrationOutcome {
  attendee: AttendeeView;
  // false when the user was already registered for the event
  created: boolean;
}

export interface CheckInOutcome {
  attendee: AttendeeView;
  alreadyCheckedIn: boolean;
}

export interface ContactUpdateOutcome {
  updatedAttendeeIds: number[];
  createdProfileId: number | null;
}

/**
 * An event attendee-set entry dropped on load because no attendee record
 * registered for that event carries the id
 */
export interface OrphanedAttendee {
  eventId: number;
  attendeeId: number;
}
