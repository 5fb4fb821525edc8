/**
 * src/modules/users/index.ts
 *
 * Public surface of the users module. Keep exports minimal.
 */

export { createUserModule } from './user.module';
export type { UserModule } from './user.module';
export type { User, UserResponse } from './user.types';
