import { validateCredentials } from '../../domain/users/credentials.js';
import { UserRequest } from '../../domain/users/user.js';
import { ApiResponse } from '../apiResponse.js';
import { UserStore } from '../userStore.js';
import { failed, succeeded, UserOutcome } from './outcome.js';

export const USER_NOT_FOUND = 'User not found';

export class UserService {
  constructor(private readonly store: UserStore) {}

  async createUser(request: UserRequest): Promise<UserOutcome> {
    const credentials = validateCredentials(request.username, request.password);
    if (!credentials.ok) {
      return failed('invalid_credentials', 'Invalid credentials');
    }

    const user = await this.store.save({
      username: credentials.username,
      password: credentials.password,
    });

    return succeeded(
      ApiResponse.builder()
        .message('User created successfully')
        .status('CREATED')
        .data({ user })
        .build()
    );
  }

  async getUserById(id: string): Promise<UserOutcome> {
    const user = await this.store.findById(id);
    if (!user) {
      return failed('not_found', USER_NOT_FOUND);
    }

    return succeeded(
      ApiResponse.builder()
        .message('User fetched successfully')
        .status('OK')
        .data({ user })
        .build()
    );
  }

  async loginUser(request: UserRequest): Promise<UserOutcome> {
    const credentials = validateCredentials(request.username, request.password);
    if (!credentials.ok) {
      return failed('invalid_credentials', 'Invalid username or password');
    }

    // Unknown user and wrong password are reported separately (404 vs 401).
    const known = await this.store.findByUsername(credentials.username);
    if (!known) {
      return failed('not_found', USER_NOT_FOUND);
    }

    const user = await this.store.findByCredentials(
      credentials.username,
      credentials.password
    );
    if (!user) {
      return failed('unauthorized', 'Invalid username or password');
    }

    return succeeded(
      ApiResponse.builder()
        .message('Login successful')
        .status('OK')
        .data({ user })
        .build()
    );
  }
}
