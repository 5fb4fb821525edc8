/**
 * src/modules/users/user.types.ts
 *
 * WHY:
 * - Domain types for the Users module.
 * - The service only reads users; rows are owned and written by another system.
 *
 * RULES:
 * - Avoid leaking DB naming (snake_case) outside DAL/queries and the HTTP response shape.
 * - Uniqueness / non-null constraints live in the DB schema; nothing is re-validated here.
 */

export type UserId = number;

export type User = {
  id: UserId;
  username: string;
  email: string;
  fullName: string;

  // Datetime columns are not read yet; always null.
  createdAt: string | null;
  updatedAt: string | null;
};

/** Wire shape of a user in GET /users. */
export type UserResponse = {
  id: UserId;
  username: string;
  email: string;
  full_name: string;
  created_at: string | null;
  updated_at: string | null;
};

export function toUserResponse(user: User): UserResponse {
  return {
    id: user.id,
    username: user.username,
    email: user.email,
    full_name: user.fullName,
    created_at: user.createdAt,
    updated_at: user.updatedAt,
  };
}
