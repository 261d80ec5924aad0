import { Catalog, CollectionName } from '../repositories/catalog.repository';
import { RecordEncoder } from '../codecs/fields';
import { Attendee } from '../models/attendee.model';
import { Event } from '../models/event.model';
import { ReconcileResult } from '../types/inventory.types';
import { AppError, ErrorCode } from '../types/error.types';
import { logger } from '../config/logger';

export interface ExportResult {
  documentName: string;
  recordCount: number;
}

const SEPARATOR = '---------------------------------------------------------';

/**
 * Plain-text attendee list for one event. Rows are split on commas by
 * readers; names and contact info never hold commas or line breaks since
 * the catalog refuses such text.
 */
export function attendeeListEncoder(event: Event): RecordEncoder<Attendee> {
  return (attendees) => {
    const lines = [
      `Attendee List for Event: ${event.name} (ID: ${event.id})`,
      `Date: ${event.date} Time: ${event.time}`,
      SEPARATOR,
    ];

    if (attendees.length === 0) {
      lines.push('No attendees registered for this event.');
    } else {
      lines.push('ID,Name,ContactInfo,CheckedInStatus');
      for (const attendee of attendees) {
        const status = attendee.isCheckedIn ? 'Checked In' : 'Not Checked In';
        lines.push(`${attendee.id},${attendee.name},${attendee.contactInfo},${status}`);
      }
    }

    return `${lines.join('\n')}\n`;
  };
}

/**
 * Maintenance Service
 *
 * Handles maintenance operations: reconciling allocation counters and
 * exporting data files
 */
export class MaintenanceService {
  constructor(private catalog: Catalog) {}

  /**
   * Rebuild every item's allocated quantity from the event ledgers and save
   * the inventory when anything changed
   */
  reconcile(): ReconcileResult {
    logger.info('Running allocation reconcile');

    const result = this.catalog.reconcileAllocations();
    if (result.adjustedItems.length > 0) {
      this.catalog.save('inventory');
    }

    logger.info('Allocation reconcile complete', {
      adjustedItems: result.adjustedItems.length,
      orphanedAllocations: result.orphanedAllocations.length,
    });

    return result;
  }

  /**
   * Write a copy of one collection to `<collection>_export.txt`
   */
  exportCollection(collection: CollectionName): ExportResult {
    const documentName = `${collection}_export.txt`;
    const recordCount = this.catalog.exportCollection(collection, documentName);

    logger.info('Collection exported', { collection, documentName, recordCount });
    return { documentName, recordCount };
  }

  /**
   * Write the attendee list of one event to `attendees_event_<id>.txt`.
   * Ids in the event's attendee set that no longer resolve are left out.
   */
  exportAttendeeList(eventId: number): ExportResult {
    const event = this.catalog.findEvent(eventId);
    if (!event) {
      throw new AppError(ErrorCode.EVENT_NOT_FOUND, `Event with ID ${eventId} not found`, 404);
    }

    const attendees = event.attendees
      .map((attendeeId) => this.catalog.findAttendee(attendeeId))
      .filter((attendee): attendee is Attendee => attendee !== null);

    const documentName = `attendees_event_${eventId}.txt`;
    this.catalog.writeDocument(documentName, attendees, attendeeListEncoder(event));

    logger.info('Attendee list exported', { eventId, documentName, recordCount: attendees.length });
    return { documentName, recordCount: attendees.length };
  }
}
