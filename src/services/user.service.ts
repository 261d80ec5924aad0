import { Catalog } from '../repositories/catalog.repository';
import { toUserView } from '../models/user.model';
import { CreateUserInput, Role, User, UserView } from '../types/user.types';
import { AppError, ErrorCode } from '../types/error.types';
import { unwrap } from '../types/result.types';
import { logger } from '../config/logger';

/**
 * User Service
 *
 * Account management and credential checks
 */
export class UserService {
  constructor(private catalog: Catalog) {}

  /**
   * Self-service sign-up; always creates a regular user
   */
  register(username: string, password: string): UserView {
    return this.createUser({ username, password, role: Role.REGULAR_USER });
  }

  createUser(input: CreateUserInput): UserView {
    logger.info('Creating user', { username: input.username, role: input.role });

    return toUserView(unwrap(this.catalog.createUser(input)));
  }

  deleteUser(username: string, actingUser: User): UserView {
    logger.info('Deleting user', { username, actingUserId: actingUser.id });

    return toUserView(unwrap(this.catalog.deleteUser(username, actingUser.id)));
  }

  listUsers(): UserView[] {
    return this.catalog.listUsers().map(toUserView);
  }

  authenticate(username: string, password: string): User {
    const user = this.catalog.verifyCredentials(username, password);

    if (!user) {
      logger.debug('Authentication failed', { username });
      throw new AppError(ErrorCode.UNAUTHORIZED, 'Invalid username or password', 401);
    }

    return user;
  }
}
