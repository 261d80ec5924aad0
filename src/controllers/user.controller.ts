import { Request, Response } from 'express';
import { UserService } from '../services/user.service';
import { currentUser } from '../middleware/auth.middleware';
import { parseRequest } from '../middleware/validation.middleware';
import {
  createUserSchema,
  deleteUserSchema,
  registerUserSchema,
} from '../validators/user.validator';
import { toUserView } from '../models/user.model';
import { createSuccessResponse } from '../utils/response-factory';
import { asyncHandler } from '../utils/async-handler';

/**
 * User Controller
 */
export class UserController {
  constructor(private userService: UserService) {}

  /**
   * POST /v1/users/register
   * Public sign-up as a regular user
   */
  register = asyncHandler((req: Request, res: Response) => {
    const { username, password } = parseRequest(registerUserSchema, req).body;

    res.status(201).json(createSuccessResponse(this.userService.register(username, password)));
  });

  /**
   * GET /v1/users/me
   */
  getCurrentUser = asyncHandler((req: Request, res: Response) => {
    res.status(200).json(createSuccessResponse(toUserView(currentUser(req))));
  });

  /**
   * GET /v1/users
   */
  listUsers = asyncHandler((_req: Request, res: Response) => {
    res.status(200).json(createSuccessResponse(this.userService.listUsers()));
  });

  /**
   * POST /v1/users
   */
  createUser = asyncHandler((req: Request, res: Response) => {
    const { body } = parseRequest(createUserSchema, req);

    res.status(201).json(createSuccessResponse(this.userService.createUser(body)));
  });

  /**
   * DELETE /v1/users/:username
   */
  deleteUser = asyncHandler((req: Request, res: Response) => {
    const { params } = parseRequest(deleteUserSchema, req);

    const user = this.userService.deleteUser(params.username, currentUser(req));

    res.status(200).json(createSuccessResponse(user, `User ${user.username} deleted`));
  });
}
