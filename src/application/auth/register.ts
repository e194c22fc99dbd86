import type { User } from '../../domain/auth/user.js';
import type { UserStore, UserValues } from '../../domain/auth/userStore.js';
import { isUniqueViolation } from '../../infra/db/sqlExecutor.js';
import { ConflictError } from '../errors.js';

export interface RegisterCommand {
  username: string;
  password: string;
  values?: UserValues;
}

export class RegisterUseCase {
  constructor(private userStore: UserStore) {}

  async execute(command: RegisterCommand): Promise<User> {
    let user: User | null;
    try {
      user = await this.userStore.storeUser(command.username, command.password, command.values);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictError('User with this username already exists');
      }
      throw error;
    }

    if (!user) {
      throw new Error('User was stored but could not be loaded');
    }
    return user;
  }
}
