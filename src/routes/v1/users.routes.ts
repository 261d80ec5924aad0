import { Router } from 'express';
import { UserController } from '../../controllers/user.controller';
import { UserService } from '../../services/user.service';
import { authenticate, requireAdmin } from '../../middleware/auth.middleware';
import { validate } from '../../middleware/validation.middleware';
import {
  createUserSchema,
  deleteUserSchema,
  registerUserSchema,
} from '../../validators/user.validator';

/**
 * User routes (v1)
 */
export function createUserRoutes(userService: UserService): Router {
  const router = Router();
  const userController = new UserController(userService);

  /**
   * @swagger
   * /v1/users/register:
   *   post:
   *     summary: Sign up as a regular user
   *     tags: [Users]
   *     security: []
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             $ref: '#/components/schemas/Credentials'
   *     responses:
   *       201:
   *         description: User created
   *       400:
   *         description: Invalid username or password
   *       409:
   *         description: Username already taken
   */
  router.post('/register', validate(registerUserSchema), userController.register);

  router.use(authenticate(userService));

  /**
   * @swagger
   * /v1/users/me:
   *   get:
   *     summary: Get the authenticated user
   *     tags: [Users]
   *     responses:
   *       200:
   *         description: Current user
   *       401:
   *         description: Missing or invalid credentials
   */
  router.get('/me', userController.getCurrentUser);

  /**
   * @swagger
   * /v1/users:
   *   get:
   *     summary: List users (admin)
   *     tags: [Users]
   *     responses:
   *       200:
   *         description: All users, without passwords
   *       403:
   *         description: Administrator access required
   *   post:
   *     summary: Create a user with a role (admin)
   *     tags: [Users]
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             allOf:
   *               - $ref: '#/components/schemas/Credentials'
   *               - type: object
   *                 required: [role]
   *                 properties:
   *                   role:
   *                     type: string
   *                     enum: [ADMIN, REGULAR_USER]
   *     responses:
   *       201:
   *         description: User created
   *       409:
   *         description: Username already taken
   */
  router.get('/', requireAdmin, userController.listUsers);
  router.post('/', requireAdmin, validate(createUserSchema), userController.createUser);

  /**
   * @swagger
   * /v1/users/{username}:
   *   delete:
   *     summary: Delete a user (admin)
   *     tags: [Users]
   *     parameters:
   *       - in: path
   *         name: username
   *         required: true
   *         schema:
   *           type: string
   *     responses:
   *       200:
   *         description: User deleted
   *       404:
   *         description: User not found
   *       409:
   *         description: Administrators cannot delete their own account
   */
  router.delete('/:username', requireAdmin, validate(deleteUserSchema), userController.deleteUser);

  return router;
}
