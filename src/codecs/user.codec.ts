import { z } from 'zod';
import { makeUser } from '../models/user.model';
import { Role, User } from '../types/user.types';
import { Result, succeed } from '../types/result.types';
import { codeField, encodeFields, idField, lineEncoder, parseFields, textField } from './fields';

/**
 * User record codec
 *
 * id,username,password,roleCode
 */

const USER_FIELDS = ['id', 'username', 'password', 'role'] as const;

// Index is the persisted role code
export const ROLE_CODES: readonly Role[] = [Role.ADMIN, Role.REGULAR_USER];

const roleField = codeField.transform((code, ctx) => {
  const role = ROLE_CODES[code];
  if (role === undefined) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unknown role code ${code}` });
    return z.NEVER;
  }
  return role;
});

const userRecord = z.object({
  id: idField,
  username: textField,
  password: textField,
  role: roleField,
});

export function decodeUser(line: string): Result<User> {
  const parsed = parseFields(userRecord, USER_FIELDS, line);
  if (!parsed.ok) return parsed;

  const { id, username, password, role } = parsed.value;
  return succeed(makeUser(id, username, password, role));
}

export function encodeUser(user: User): string {
  return encodeFields([user.id, user.username, user.password, ROLE_CODES.indexOf(user.role)]);
}

export const encodeUsers = lineEncoder(encodeUser);
