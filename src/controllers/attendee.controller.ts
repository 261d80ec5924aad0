import { Request, Response } from 'express';
import { AttendeeService } from '../services/attendee.service';
import { currentUser } from '../middleware/auth.middleware';
import { parseRequest } from '../middleware/validation.middleware';
import { listAttendeesSchema, updateContactSchema } from '../validators/attendee.validator';
import { checkInSchema, eventIdSchema, registrationSchema } from '../validators/event.validator';
import { createSuccessResponse } from '../utils/response-factory';
import { asyncHandler } from '../utils/async-handler';

/**
 * Attendee Controller
 *
 * HTTP request handlers for registration, check-in and contact details
 */
export class AttendeeController {
  constructor(private attendeeService: AttendeeService) {}

  /**
   * POST /v1/events/:id/registrations
   * Register the current user; 201 when a new attendee was created
   */
  register = asyncHandler((req: Request, res: Response) => {
    const { params, body } = parseRequest(registrationSchema, req);

    const outcome = this.attendeeService.register(currentUser(req), params.id, body.contact_info);

    res
      .status(outcome.created ? 201 : 200)
      .json(
        createSuccessResponse(
          outcome,
          outcome.created ? 'Registered for event' : 'Already registered for this event'
        )
      );
  });

  /**
   * DELETE /v1/events/:id/registrations
   */
  cancelRegistration = asyncHandler((req: Request, res: Response) => {
    const { params } = parseRequest(eventIdSchema, req);

    const attendee = this.attendeeService.cancelRegistration(currentUser(req), params.id);

    res.status(200).json(createSuccessResponse(attendee, 'Registration canceled'));
  });

  /**
   * POST /v1/events/:id/check-ins
   */
  checkIn = asyncHandler((req: Request, res: Response) => {
    const { params, body } = parseRequest(checkInSchema, req);

    const outcome = this.attendeeService.checkIn(params.id, body.attendee_id);

    res
      .status(200)
      .json(
        createSuccessResponse(
          outcome,
          outcome.alreadyCheckedIn ? 'Attendee was already checked in' : 'Attendee checked in'
        )
      );
  });

  /**
   * GET /v1/attendees?event_id=
   */
  listAttendees = asyncHandler((req: Request, res: Response) => {
    const { query } = parseRequest(listAttendeesSchema, req);

    res.status(200).json(createSuccessResponse(this.attendeeService.listAttendees(query.event_id)));
  });

  /**
   * PUT /v1/attendees/me/contact
   * Update contact info on every attendee record the current user owns
   */
  updateContact = asyncHandler((req: Request, res: Response) => {
    const { body } = parseRequest(updateContactSchema, req);

    const outcome = this.attendeeService.updateContactInfo(currentUser(req), body.contact_info);

    res.status(200).json(createSuccessResponse(outcome, 'Contact info updated'));
  });
}
