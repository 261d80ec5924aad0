/**
 * User domain types
 */

export enum Role {
  ADMIN = 'ADMIN',
  REGULAR_USER = 'REGULAR_USER',
}

interface UserBase {
  id: number;
  username: string;
  password: string;
}

export interface AdminUser extends UserBase {
  role: Role.ADMIN;
}

export interface RegularUser extends UserBase {
  role: Role.REGULAR_USER;
}

// Tagged on `role`; privileged operations check it through isAdmin()
export type User = AdminUser | RegularUser;

// Public projection (no password)
export interface UserView {
  id: number;
  username: string;
  role: Role;
}

export interface CreateUserInput {
  username: string;
  password: string;
  role: Role;
}
