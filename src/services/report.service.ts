import { Catalog } from '../repositories/catalog.repository';
import { AttendanceReport } from '../types/event.types';
import { InventoryReport } from '../types/inventory.types';
import { AppError, ErrorCode } from '../types/error.types';
import { logger } from '../config/logger';

/**
 * Report Service
 *
 * Read-only summaries over the catalog
 */
export class ReportService {
  constructor(private catalog: Catalog) {}

  /**
   * Registered attendees of an event and how many have checked in.
   *
   * Ids in the event's attendee set that no longer resolve are listed under
   * unknownAttendeeIds but still count as registered.
   */
  attendanceReport(eventId: number): AttendanceReport {
    logger.debug('Building attendance report', { eventId });

    const event = this.catalog.findEvent(eventId);
    if (!event) {
      throw new AppError(ErrorCode.EVENT_NOT_FOUND, `Event with ID ${eventId} not found`, 404);
    }

    const report: AttendanceReport = {
      eventId,
      eventName: event.name,
      attendees: [],
      unknownAttendeeIds: [],
      totalRegistered: event.attendees.length,
      totalCheckedIn: 0,
      attendancePercentage: 0,
    };

    for (const attendeeId of event.attendees) {
      const attendee = this.catalog.findAttendee(attendeeId);
      if (!attendee) {
        report.unknownAttendeeIds.push(attendeeId);
        continue;
      }
      report.attendees.push({
        id: attendee.id,
        name: attendee.name,
        contactInfo: attendee.contactInfo,
        isCheckedIn: attendee.isCheckedIn,
      });
      if (attendee.isCheckedIn) report.totalCheckedIn++;
    }

    if (report.totalRegistered > 0) {
      report.attendancePercentage = (report.totalCheckedIn / report.totalRegistered) * 100;
    }

    return report;
  }

  /**
   * Stock levels per item, overall totals, and what each event holds
   */
  inventoryReport(): InventoryReport {
    logger.debug('Building inventory report');

    const items = this.catalog.listItems().map((item) => item.toView());

    const totals = items.reduce(
      (sum, item) => ({
        totalQuantity: sum.totalQuantity + item.totalQuantity,
        allocatedQuantity: sum.allocatedQuantity + item.allocatedQuantity,
        availableQuantity: sum.availableQuantity + item.availableQuantity,
      }),
      { totalQuantity: 0, allocatedQuantity: 0, availableQuantity: 0 }
    );

    const allocationsByEvent: InventoryReport['allocationsByEvent'] = [];
    for (const event of this.catalog.listEvents()) {
      const eventItems: InventoryReport['allocationsByEvent'][number]['items'] = [];
      for (const [itemId, quantity] of event.allocations) {
        const item = this.catalog.findItem(itemId);
        if (item && quantity > 0) {
          eventItems.push({ itemId, name: item.name, quantity });
        }
      }
      if (eventItems.length > 0) {
        allocationsByEvent.push({ eventId: event.id, eventName: event.name, items: eventItems });
      }
    }

    return { items, totals, allocationsByEvent };
  }
}
