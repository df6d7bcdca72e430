/**
 * User entity state.
 * `id` is absent until the store assigns one.
 */
export interface UserState {
  readonly id?: number;
  readonly email: string;
  readonly username: string;
  readonly fullName: string;
  readonly isActive: boolean;
  readonly createdAt: Date;
  readonly updatedAt: Date;
}

export interface NewUserProps {
  email: string;
  username: string;
  fullName: string;
}

export type PersistedUserState = UserState & { readonly id: number };

/**
 * User entity. Holds state and the in-memory transitions only;
 * persistence and uniqueness belong to the repository.
 */
export class User {
  private constructor(private state: UserState) {}

  /**
   * Build a user that has not been stored yet.
   */
  static create(props: NewUserProps, now: Date): User {
    return new User({
      email: props.email,
      username: props.username,
      fullName: props.fullName,
      isActive: true,
      createdAt: now,
      updatedAt: now,
    });
  }

  /**
   * Rehydrate a user loaded from a store.
   */
  static fromPersistence(state: PersistedUserState): User {
    return new User({ ...state });
  }

  get id(): number | undefined {
    return this.state.id;
  }

  get isActive(): boolean {
    return this.state.isActive;
  }

  getState(): UserState {
    return { ...this.state };
  }

  deactivate(): void {
    this.state = { ...this.state, isActive: false };
  }

  updateProfile(fullName: string): void {
    this.state = { ...this.state, fullName };
  }

  /**
   * Move updatedAt forward. Never goes backwards and always advances by at
   * least one millisecond, so successive mutations stay ordered.
   */
  touch(at: Date): void {
    const previous = this.state.updatedAt.getTime();
    const next = at.getTime() > previous ? at.getTime() : previous + 1;
    this.state = { ...this.state, updatedAt: new Date(next) };
  }
}
