import { User } from '../../domain/user/user.js';
import { UserListFilters, UserRepository } from '../../domain/user/userRepository.js';
import { UserNotFoundError } from '../../domain/user/errors.js';
import {
  UserDto,
  UserListDto,
  createUserCommandSchema,
  updateUserCommandSchema,
  listUsersQuerySchema,
  parseCommand,
  toUserDto,
} from './dtos.js';

export type UserLookup = { id: number } | { email: string } | { username: string };

export type Clock = () => Date;

/**
 * User use cases. Commands are validated here before any repository call;
 * NotFound and uniqueness errors propagate unchanged to the caller.
 */
export class UserService {
  constructor(
    private userRepo: UserRepository,
    private clock: Clock = () => new Date()
  ) {}

  async createUser(input: unknown): Promise<UserDto> {
    const command = parseCommand(createUserCommandSchema, input);

    const user = User.create(command, this.clock());
    const created = await this.userRepo.create(user);

    return toUserDto(created);
  }

  async getUser(lookup: UserLookup): Promise<UserDto> {
    return toUserDto(await this.loadUser(lookup));
  }

  async listUsers(filters?: UserListFilters): Promise<UserDto[]> {
    const users = await this.userRepo.list(filters);
    return users.map(toUserDto);
  }

  /**
   * Paginated listing with the total count of matching users.
   */
  async listUsersPage(input: unknown): Promise<UserListDto> {
    const query = parseCommand(listUsersQuerySchema, input);

    const [users, total] = await Promise.all([
      this.userRepo.list(query),
      this.userRepo.count({ isActive: query.isActive }),
    ]);

    return {
      users: users.map(toUserDto),
      total,
      offset: query.offset,
      limit: query.limit,
    };
  }

  async updateUser(id: number, input: unknown): Promise<UserDto> {
    const command = parseCommand(updateUserCommandSchema, input);
    const user = await this.loadUser({ id });

    if (command.fullName !== undefined) {
      user.updateProfile(command.fullName);
    }
    user.touch(this.clock());

    return toUserDto(await this.userRepo.update(user));
  }

  /**
   * Deactivate a user. Repeating the call keeps the user inactive and still
   * advances updatedAt.
   */
  async deactivateUser(id: number): Promise<UserDto> {
    const user = await this.loadUser({ id });

    user.deactivate();
    user.touch(this.clock());

    return toUserDto(await this.userRepo.update(user));
  }

  private async loadUser(lookup: UserLookup): Promise<User> {
    if ('id' in lookup) {
      const user = await this.userRepo.findById(lookup.id);
      if (!user) throw new UserNotFoundError('id', lookup.id);
      return user;
    }

    if ('email' in lookup) {
      const user = await this.userRepo.findByEmail(lookup.email);
      if (!user) throw new UserNotFoundError('email', lookup.email);
      return user;
    }

    const user = await this.userRepo.findByUsername(lookup.username);
    if (!user) throw new UserNotFoundError('username', lookup.username);
    return user;
  }
}
