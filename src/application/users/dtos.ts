import { z } from 'zod';
import { User } from '../../domain/user/user.js';
import { ValidationError } from '../errors.js';

export const createUserCommandSchema = z.object({
  email: z.string().email().max(255),
  username: z.string().min(1).max(50),
  fullName: z.string().min(1).max(100),
});

export const updateUserCommandSchema = z
  .object({
    fullName: z.string().min(1).max(100).optional(),
  })
  .strict();

export const listUsersQuerySchema = z.object({
  isActive: z
    .enum(['true', 'false'])
    .transform((v) => v === 'true')
    .optional(),
  offset: z.coerce.number().int().min(0).default(0),
  limit: z.coerce.number().int().min(1).max(1000).default(100),
  orderBy: z.enum(['id', 'email', 'username', 'createdAt', 'updatedAt']).optional(),
  order: z.enum(['asc', 'desc']).optional(),
});

export type CreateUserCommand = z.infer<typeof createUserCommandSchema>;
export type UpdateUserCommand = z.infer<typeof updateUserCommandSchema>;
export type ListUsersQuery = z.infer<typeof listUsersQuerySchema>;

export interface UserDto {
  id: number;
  email: string;
  username: string;
  fullName: string;
  isActive: boolean;
  createdAt: string;
  updatedAt: string;
}

export interface UserListDto {
  users: UserDto[];
  total: number;
  offset: number;
  limit: number;
}

/**
 * Parse untrusted input against a schema, throwing ValidationError on failure.
 */
export function parseCommand<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw ValidationError.fromZod(result.error);
  }
  return result.data;
}

export function toUserDto(user: User): UserDto {
  const state = user.getState();
  if (state.id === undefined) {
    throw new Error('Cannot map a user that has not been persisted');
  }

  return {
    id: state.id,
    email: state.email,
    username: state.username,
    fullName: state.fullName,
    isActive: state.isActive,
    createdAt: state.createdAt.toISOString(),
    updatedAt: state.updatedAt.toISOString(),
  };
}
