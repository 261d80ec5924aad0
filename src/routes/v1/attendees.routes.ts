import { Router } from 'express';
import { AttendeeController } from '../../controllers/attendee.controller';
import { Services } from '../../services';
import { authenticate, requireAdmin } from '../../middleware/auth.middleware';
import { validate } from '../../middleware/validation.middleware';
import { listAttendeesSchema, updateContactSchema } from '../../validators/attendee.validator';

/**
 * Attendee routes (v1)
 */
export function createAttendeeRoutes(services: Services): Router {
  const router = Router();
  const attendeeController = new AttendeeController(services.attendees);

  router.use(authenticate(services.users));

  /**
   * @swagger
   * /v1/attendees:
   *   get:
   *     summary: List attendee records (admin)
   *     tags: [Attendees]
   *     parameters:
   *       - in: query
   *         name: event_id
   *         schema:
   *           type: integer
   *     responses:
   *       200:
   *         description: Attendees, optionally filtered by event
   */
  router.get('/', requireAdmin, validate(listAttendeesSchema), attendeeController.listAttendees);

  /**
   * @swagger
   * /v1/attendees/me/contact:
   *   put:
   *     summary: Update the current user's contact info
   *     tags: [Attendees]
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
   *       200:
   *         description: Contact info updated on every owned attendee record
   */
  router.put('/me/contact', validate(updateContactSchema), attendeeController.updateContact);

  return router;
}
