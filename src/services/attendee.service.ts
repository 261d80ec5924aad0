import { Catalog } from '../repositories/catalog.repository';
import {
  AttendeeView,
  CheckInOutcome,
  ContactUpdateOutcome,
  RegistrationOutcome,
} from '../types/attendee.types';
import { User } from '../types/user.types';
import { unwrap } from '../types/result.types';
import { logger } from '../config/logger';

/**
 * Attendee Service
 *
 * Registration, cancellation, check-in and contact details
 */
export class AttendeeService {
  constructor(private catalog: Catalog) {}

  /**
   * Register the user for an event (idempotent)
   *
   * Business rules:
   * - Only regular users register themselves
   * - Completed and canceled events are closed
   * - Registering twice returns the existing attendee
   */
  register(user: User, eventId: number, contactInfo: string): RegistrationOutcome {
    logger.info('Registering attendee', { userId: user.id, eventId });

    return unwrap(this.catalog.registerForEvent(user, eventId, contactInfo));
  }

  cancelRegistration(user: User, eventId: number): AttendeeView {
    logger.info('Canceling registration', { userId: user.id, eventId });

    return unwrap(this.catalog.cancelRegistration(user, eventId)).toView();
  }

  /**
   * Check an attendee in (idempotent)
   */
  checkIn(eventId: number, attendeeId: number): CheckInOutcome {
    logger.info('Checking in attendee', { eventId, attendeeId });

    return unwrap(this.catalog.checkIn(eventId, attendeeId));
  }

  updateContactInfo(user: User, contactInfo: string): ContactUpdateOutcome {
    logger.info('Updating contact info', { userId: user.id });

    return unwrap(this.catalog.updateContactInfo(user, contactInfo));
  }

  listAttendees(eventId?: number): AttendeeView[] {
    return this.catalog.listAttendees(eventId).map((attendee) => attendee.toView());
  }
}
