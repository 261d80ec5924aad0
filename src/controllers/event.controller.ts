import { Request, Response } from 'express';
import { EventService } from '../services/event.service';
import { ReportService } from '../services/report.service';
import { MaintenanceService } from '../services/maintenance.service';
import { parseRequest } from '../middleware/validation.middleware';
import {
  createEventSchema,
  eventIdSchema,
  searchEventsSchema,
  updateEventSchema,
  updateEventStatusSchema,
} from '../validators/event.validator';
import { createSuccessResponse } from '../utils/response-factory';
import { asyncHandler } from '../utils/async-handler';

/**
 * Event Controller
 *
 * HTTP request handlers for event endpoints
 */
export class EventController {
  constructor(
    private eventService: EventService,
    private reportService: ReportService,
    private maintenanceService: MaintenanceService
  ) {}

  /**
   * POST /v1/events
   * Create a new event
   */
  createEvent = asyncHandler((req: Request, res: Response) => {
    const { body } = parseRequest(createEventSchema, req);

    const event = this.eventService.createEvent(body);

    res.status(201).json(createSuccessResponse(event));
  });

  /**
   * GET /v1/events
   */
  listEvents = asyncHandler((_req: Request, res: Response) => {
    res.status(200).json(createSuccessResponse(this.eventService.listEvents()));
  });

  /**
   * GET /v1/events/search?q=
   * Case-insensitive match on the name, or a substring of the date
   */
  searchEvents = asyncHandler((req: Request, res: Response) => {
    const { query } = parseRequest(searchEventsSchema, req);

    res.status(200).json(createSuccessResponse(this.eventService.searchEvents(query.q)));
  });

  /**
   * GET /v1/events/:id
   * Get event with attendee and item names resolved
   */
  getEvent = asyncHandler((req: Request, res: Response) => {
    const { params } = parseRequest(eventIdSchema, req);

    res.status(200).json(createSuccessResponse(this.eventService.getEvent(params.id)));
  });

  /**
   * PATCH /v1/events/:id
   */
  updateEvent = asyncHandler((req: Request, res: Response) => {
    const { params, body } = parseRequest(updateEventSchema, req);

    const event = this.eventService.updateEvent(params.id, body);

    res.status(200).json(createSuccessResponse(event, 'Event updated'));
  });

  /**
   * PUT /v1/events/:id/status
   */
  updateStatus = asyncHandler((req: Request, res: Response) => {
    const { params, body } = parseRequest(updateEventStatusSchema, req);

    const event = this.eventService.updateStatus(params.id, body.status);

    res.status(200).json(createSuccessResponse(event, `Event status set to ${event.status}`));
  });

  /**
   * DELETE /v1/events/:id
   * Delete an event, releasing its inventory and removing its attendees
   */
  deleteEvent = asyncHandler((req: Request, res: Response) => {
    const { params } = parseRequest(eventIdSchema, req);

    const outcome = this.eventService.deleteEvent(params.id);

    res.status(200).json(createSuccessResponse(outcome, `Event ${params.id} deleted`));
  });

  /**
   * GET /v1/events/:id/attendance
   */
  getAttendance = asyncHandler((req: Request, res: Response) => {
    const { params } = parseRequest(eventIdSchema, req);

    res.status(200).json(createSuccessResponse(this.reportService.attendanceReport(params.id)));
  });

  /**
   * POST /v1/events/:id/attendee-export
   * Write the event's attendee list to the data directory
   */
  exportAttendees = asyncHandler((req: Request, res: Response) => {
    const { params } = parseRequest(eventIdSchema, req);

    const result = this.maintenanceService.exportAttendeeList(params.id);

    res
      .status(200)
      .json(createSuccessResponse(result, `Attendee list written to ${result.documentName}`));
  });
}
