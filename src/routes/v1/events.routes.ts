import { Router } from 'express';
import { EventController } from '../../controllers/event.controller';
import { InventoryController } from '../../controllers/inventory.controller';
import { AttendeeController } from '../../controllers/attendee.controller';
import { Services } from '../../services';
import { authenticate, requireAdmin } from '../../middleware/auth.middleware';
import { validate } from '../../middleware/validation.middleware';
import {
  allocationSchema,
  checkInSchema,
  createEventSchema,
  eventIdSchema,
  registrationSchema,
  searchEventsSchema,
  updateEventSchema,
  updateEventStatusSchema,
} from '../../validators/event.validator';

/**
 * Event routes (v1)
 */
export function createEventRoutes(services: Services): Router {
  const router = Router();
  const eventController = new EventController(services.events, services.reports, services.maintenance);
  const inventoryController = new InventoryController(services.inventory, services.reports);
  const attendeeController = new AttendeeController(services.attendees);

  router.use(authenticate(services.users));

  /**
   * @swagger
   * /v1/events:
   *   get:
   *     summary: List events
   *     tags: [Events]
   *     responses:
   *       200:
   *         description: All events, ordered by id
   *   post:
   *     summary: Create an event (admin)
   *     tags: [Events]
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             $ref: '#/components/schemas/EventDetails'
   *     responses:
   *       201:
   *         description: Event created with status UPCOMING
   *       400:
   *         description: Invalid date, time or field
   */
  router.get('/', eventController.listEvents);
  router.post('/', requireAdmin, validate(createEventSchema), eventController.createEvent);

  /**
   * @swagger
   * /v1/events/search:
   *   get:
   *     summary: Search events by name (case-insensitive) or date substring
   *     tags: [Events]
   *     parameters:
   *       - in: query
   *         name: q
   *         required: true
   *         schema:
   *           type: string
   *     responses:
   *       200:
   *         description: Matching events
   */
  router.get('/search', validate(searchEventsSchema), eventController.searchEvents);

  /**
   * @swagger
   * /v1/events/{id}:
   *   get:
   *     summary: Get event with attendee and item names
   *     tags: [Events]
   *     parameters:
   *       - $ref: '#/components/parameters/EventId'
   *     responses:
   *       200:
   *         description: Event retrieved successfully
   *       404:
   *         description: Event not found
   *   patch:
   *     summary: Edit event details (admin)
   *     tags: [Events]
   *     parameters:
   *       - $ref: '#/components/parameters/EventId'
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             $ref: '#/components/schemas/EventDetails'
   *     responses:
   *       200:
   *         description: Event updated
   *       404:
   *         description: Event not found
   *   delete:
   *     summary: Delete an event (admin)
   *     description: Releases the event's allocated inventory and removes its attendees.
   *     tags: [Events]
   *     parameters:
   *       - $ref: '#/components/parameters/EventId'
   *     responses:
   *       200:
   *         description: Event deleted
   *       404:
   *         description: Event not found
   */
  router.get('/:id', validate(eventIdSchema), eventController.getEvent);
  router.patch('/:id', requireAdmin, validate(updateEventSchema), eventController.updateEvent);
  router.delete('/:id', requireAdmin, validate(eventIdSchema), eventController.deleteEvent);

  /**
   * @swagger
   * /v1/events/{id}/status:
   *   put:
   *     summary: Set event status (admin)
   *     tags: [Events]
   *     parameters:
   *       - $ref: '#/components/parameters/EventId'
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required: [status]
   *             properties:
   *               status:
   *                 type: string
   *                 enum: [UPCOMING, ONGOING, COMPLETED, CANCELED]
   *     responses:
   *       200:
   *         description: Status updated
   */
  router.put('/:id/status', requireAdmin, validate(updateEventStatusSchema), eventController.updateStatus);

  /**
   * @swagger
   * /v1/events/{id}/allocations:
   *   post:
   *     summary: Allocate inventory to the event (admin)
   *     tags: [Allocations]
   *     parameters:
   *       - $ref: '#/components/parameters/EventId'
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             $ref: '#/components/schemas/Allocation'
   *     responses:
   *       200:
   *         description: Allocation recorded
   *       409:
   *         description: Not enough available stock
   * /v1/events/{id}/deallocations:
   *   post:
   *     summary: Return inventory from the event (admin)
   *     description: Releases at most what the event holds; the response carries the released quantity.
   *     tags: [Allocations]
   *     parameters:
   *       - $ref: '#/components/parameters/EventId'
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             $ref: '#/components/schemas/Allocation'
   *     responses:
   *       200:
   *         description: Stock released
   *       404:
   *         description: Event holds none of this item
   */
  router.post('/:id/allocations', requireAdmin, validate(allocationSchema), inventoryController.allocate);
  router.post('/:id/deallocations', requireAdmin, validate(allocationSchema), inventoryController.deallocate);

  /**
   * @swagger
   * /v1/events/{id}/registrations:
   *   post:
   *     summary: Register the current user for the event
   *     tags: [Attendees]
   *     parameters:
   *       - $ref: '#/components/parameters/EventId'
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required: [contact_info]
   *             properties:
   *               contact_info:
   *                 type: string
   *     responses:
   *       201:
   *         description: Registered
   *       200:
   *         description: Already registered; existing attendee returned
   *       403:
   *         description: Only regular users register for events
   *       409:
   *         description: Event is completed or canceled
   *   delete:
   *     summary: Cancel the current user's registration
   *     tags: [Attendees]
   *     parameters:
   *       - $ref: '#/components/parameters/EventId'
   *     responses:
   *       200:
   *         description: Registration canceled
   *       404:
   *         description: Not registered for this event
   */
  router.post('/:id/registrations', validate(registrationSchema), attendeeController.register);
  router.delete('/:id/registrations', validate(eventIdSchema), attendeeController.cancelRegistration);

  /**
   * @swagger
   * /v1/events/{id}/check-ins:
   *   post:
   *     summary: Check an attendee in (admin)
   *     tags: [Attendees]
   *     parameters:
   *       - $ref: '#/components/parameters/EventId'
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required: [attendee_id]
   *             properties:
   *               attendee_id:
   *                 type: integer
   *                 minimum: 1
   *     responses:
   *       200:
   *         description: Checked in (or already was)
   *       404:
   *         description: Attendee not registered for this event
   * /v1/events/{id}/attendance:
   *   get:
   *     summary: Attendance report (admin)
   *     tags: [Reports]
   *     parameters:
   *       - $ref: '#/components/parameters/EventId'
   *     responses:
   *       200:
   *         description: Registered and checked-in counts
   * /v1/events/{id}/attendee-export:
   *   post:
   *     summary: Write the attendee list to the data directory (admin)
   *     tags: [Maintenance]
   *     parameters:
   *       - $ref: '#/components/parameters/EventId'
   *     responses:
   *       200:
   *         description: Document written
   */
  router.post('/:id/check-ins', requireAdmin, validate(checkInSchema), attendeeController.checkIn);
  router.get('/:id/attendance', requireAdmin, validate(eventIdSchema), eventController.getAttendance);
  router.post('/:id/attendee-export', requireAdmin, validate(eventIdSchema), eventController.exportAttendees);

  return router;
}
