import { Request, Response, NextFunction, RequestHandler } from 'express';
import { UserService } from '../services/user.service';
import { isAdmin } from '../models/user.model';
import { User } from '../types/user.types';
import { AppError, ErrorCode } from '../types/error.types';

// Users resolved by `authenticate`, keyed by the request they arrived on
const authenticatedUsers = new WeakMap<Request, User>();

function parseBasicCredentials(header: string | undefined): { username: string; password: string } | null {
  if (!header || !header.startsWith('Basic ')) return null;

  const decoded = Buffer.from(header.slice('Basic '.length), 'base64').toString('utf8');
  const separator = decoded.indexOf(':');
  if (separator < 0) return null;

  return { username: decoded.slice(0, separator), password: decoded.slice(separator + 1) };
}

/**
 * HTTP Basic authentication against the user records
 */
export const authenticate = (userService: UserService): RequestHandler => {
  return (req: Request, res: Response, next: NextFunction) => {
    const credentials = parseBasicCredentials(req.headers.authorization);

    if (!credentials) {
      res.setHeader('WWW-Authenticate', 'Basic realm="events"');
      next(new AppError(ErrorCode.UNAUTHORIZED, 'Authentication required', 401));
      return;
    }

    try {
      authenticatedUsers.set(req, userService.authenticate(credentials.username, credentials.password));
      next();
    } catch (error) {
      res.setHeader('WWW-Authenticate', 'Basic realm="events"');
      next(error);
    }
  };
};

/**
 * Gate a route on the admin capability
 */
export const requireAdmin = (req: Request, _res: Response, next: NextFunction) => {
  const user = authenticatedUsers.get(req);

  if (!user) {
    next(new AppError(ErrorCode.UNAUTHORIZED, 'Authentication required', 401));
    return;
  }
  if (!isAdmin(user)) {
    next(new AppError(ErrorCode.FORBIDDEN, 'Administrator access required', 403));
    return;
  }

  next();
};

/**
 * The user `authenticate` resolved for this request
 */
export function currentUser(req: Request): User {
  const user = authenticatedUsers.get(req);

  if (!user) {
    throw new AppError(ErrorCode.UNAUTHORIZED, 'Authentication required', 401);
  }

  return user;
}
