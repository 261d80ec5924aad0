import { AdminUser, Role, User, UserView } from '../types/user.types';

export const MIN_PASSWORD_LENGTH = 6;

export function isAdmin(user: User): user is AdminUser {
  return user.role === Role.ADMIN;
}

export function makeUser(id: number, username: string, password: string, role: Role): User {
  return role === Role.ADMIN
    ? { id, username, password, role: Role.ADMIN }
    : { id, username, password, role: Role.REGULAR_USER };
}

export function toUserView(user: User): UserView {
  return { id: user.id, username: user.username, role: user.role };
}
