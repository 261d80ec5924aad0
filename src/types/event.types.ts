/**
 * Event domain types
 */

// Event status enum
export enum EventStatus {
  UPCOMING = 'UPCOMING',
  ONGOING = 'ONGOING',
  COMPLETED = 'COMPLETED',
  CANCELED = 'CANCELED',
}

export interface EventDetails {
  name: string;
  date: string;
  time: string;
  location: string;
  description: string;
  category: string;
}

export type UpdateEventInput = Partial<EventDetails>;

export interface EventView extends EventDetails {
  id: number;
  status: EventStatus;
  attendeeIds: number[];
  allocations: Array<{ itemId: number; quantity: number }>;
}

// Event with attendee and item references resolved for display
export interface EventDetailView extends EventView {
  attendees: Array<{ id: number; name: string | null; isCheckedIn: boolean }>;
  allocatedItems: Array<{ itemId: number; name: string | null; quantity: number }>;
}

export interface DeleteEventOutcome {
  eventId: number;
  releasedItems: Array<{ itemId: number; quantity: number }>;
  missingItemIds: number[];
  removedAttendeeIds: number[];
}

export interface AttendanceReport {
  eventId: number;
  eventName: string;
  attendees: Array<{ id: number; name: string; contactInfo: string; isCheckedIn: boolean }>;
  unknownAttendeeIds: number[];
  totalRegistered: number;
  totalCheckedIn: number;
  attendancePercentage: number;
}
