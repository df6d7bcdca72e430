import { describe, it, expect } from 'vitest';
import { User } from '../user.js';

describe('User', () => {
  const now = new Date('2024-03-01T10:00:00.000Z');
  const props = { email: 'a@x.com', username: 'alice', fullName: 'Alice' };

  describe('create', () => {
    it('should create an active user without an id', () => {
      const user = User.create(props, now);
      const state = user.getState();

      expect(state.id).toBeUndefined();
      expect(state.email).toBe('a@x.com');
      expect(state.username).toBe('alice');
      expect(state.fullName).toBe('Alice');
      expect(state.isActive).toBe(true);
      expect(state.createdAt).toEqual(now);
      expect(state.updatedAt).toEqual(now);
    });
  });

  describe('fromPersistence', () => {
    it('should keep the stored id and flags', () => {
      const user = User.fromPersistence({
        id: 7,
        ...props,
        isActive: false,
        createdAt: now,
        updatedAt: now,
      });

      expect(user.id).toBe(7);
      expect(user.isActive).toBe(false);
    });
  });

  describe('deactivate', () => {
    it('should flip isActive and leave timestamps alone', () => {
      const user = User.create(props, now);

      user.deactivate();

      expect(user.isActive).toBe(false);
      expect(user.getState().updatedAt).toEqual(now);
    });

    it('should be a no-op on an inactive user', () => {
      const user = User.create(props, now);
      user.deactivate();
      user.deactivate();

      expect(user.isActive).toBe(false);
    });
  });

  describe('updateProfile', () => {
    it('should change only the full name', () => {
      const user = User.create(props, now);

      user.updateProfile('Alice Cooper');

      const state = user.getState();
      expect(state.fullName).toBe('Alice Cooper');
      expect(state.email).toBe('a@x.com');
      expect(state.updatedAt).toEqual(now);
    });
  });

  describe('touch', () => {
    it('should move updatedAt to a later time', () => {
      const user = User.create(props, now);
      const later = new Date('2024-03-01T10:05:00.000Z');

      user.touch(later);

      expect(user.getState().updatedAt).toEqual(later);
    });

    it('should advance by one millisecond when the clock has not moved', () => {
      const user = User.create(props, now);

      user.touch(now);

      expect(user.getState().updatedAt.toISOString()).toBe('2024-03-01T10:00:00.001Z');
    });

    it('should never move updatedAt backwards', () => {
      const user = User.create(props, now);

      user.touch(new Date('2024-02-01T00:00:00.000Z'));

      expect(user.getState().updatedAt.toISOString()).toBe('2024-03-01T10:00:00.001Z');
      expect(user.getState().createdAt).toEqual(now);
    });
  });

  it('should hand out snapshots that do not change with the entity', () => {
    const user = User.create(props, now);
    const before = user.getState();

    user.deactivate();

    expect(before.isActive).toBe(true);
  });
});
