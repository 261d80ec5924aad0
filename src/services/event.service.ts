import { Catalog } from '../repositories/catalog.repository';
import { Event } from '../models/event.model';
import {
  DeleteEventOutcome,
  EventDetailView,
  EventDetails,
  EventStatus,
  EventView,
  UpdateEventInput,
} from '../types/event.types';
import { AppError, ErrorCode } from '../types/error.types';
import { unwrap } from '../types/result.types';
import { logger } from '../config/logger';

/**
 * Event Service
 *
 * Business logic for event operations
 */
export class EventService {
  constructor(private catalog: Catalog) {}

  createEvent(details: EventDetails): EventView {
    logger.info('Creating event', details);

    const event = unwrap(this.catalog.createEvent(details));

    logger.info('Event created successfully', { eventId: event.id });
    return event.toView();
  }

  listEvents(): EventView[] {
    return this.catalog.listEvents().map((event) => event.toView());
  }

  searchEvents(term: string): EventView[] {
    logger.debug('Searching events', { term });

    return this.catalog.searchEvents(term).map((event) => event.toView());
  }

  /**
   * Get an event with attendee and item names resolved.
   * Dangling references are kept with a null name.
   */
  getEvent(id: number): EventDetailView {
    logger.debug('Getting event', { id });

    const event = this.requireEvent(id);

    return {
      ...event.toView(),
      attendees: event.attendees.map((attendeeId) => {
        const attendee = this.catalog.findAttendee(attendeeId);
        return {
          id: attendeeId,
          name: attendee?.name ?? null,
          isCheckedIn: attendee?.isCheckedIn ?? false,
        };
      }),
      allocatedItems: [...event.allocations].map(([itemId, quantity]) => ({
        itemId,
        name: this.catalog.findItem(itemId)?.name ?? null,
        quantity,
      })),
    };
  }

  updateEvent(id: number, changes: UpdateEventInput): EventView {
    logger.info('Updating event', { id, ...changes });

    return unwrap(this.catalog.updateEventDetails(id, changes)).toView();
  }

  updateStatus(id: number, status: EventStatus): EventView {
    logger.info('Updating event status', { id, status });

    return unwrap(this.catalog.setEventStatus(id, status)).toView();
  }

  /**
   * Delete an event, releasing its inventory and removing its attendees
   */
  deleteEvent(id: number): DeleteEventOutcome {
    logger.info('Deleting event', { id });

    return unwrap(this.catalog.deleteEvent(id));
  }

  private requireEvent(id: number): Event {
    const event = this.catalog.findEvent(id);

    if (!event) {
      throw new AppError(ErrorCode.EVENT_NOT_FOUND, `Event with ID ${id} not found`, 404);
    }

    return event;
  }
}
