import type { User } from '../../domain/auth/user.js';
import type { UserStore } from '../../domain/auth/userStore.js';
import type { SessionTokens } from './sessionTokens.js';

/**
 * Resolve the user behind a session cookie value.
 */
export class CurrentUserUseCase {
  constructor(
    private userStore: UserStore,
    private sessions: SessionTokens
  ) {}

  async execute(token: string | null): Promise<User | null> {
    if (!token) {
      return null;
    }
    const userId = this.sessions.resolve(token);
    if (userId === null) {
      return null;
    }
    return await this.userStore.loadUserById(userId);
  }
}
