import type { User } from '../../domain/auth/user.js';
import type { UserStore } from '../../domain/auth/userStore.js';
import { UnauthorizedError } from '../errors.js';
import type { SessionTokens } from './sessionTokens.js';

export interface LoginCommand {
  username: string;
  password: string;
}

export interface LoginResult {
  token: string;
  user: User;
}

export class LoginUseCase {
  constructor(
    private userStore: UserStore,
    private sessions: SessionTokens
  ) {}

  async execute(command: LoginCommand): Promise<LoginResult> {
    const user = await this.userStore.loadUser(command.username, command.password);
    if (!user) {
      throw new UnauthorizedError('Invalid username or password');
    }

    return { token: this.sessions.issue(user.id), user };
  }
}
