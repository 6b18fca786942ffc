import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('../../server/core/logger', () => ({
  logger: {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn()
  }
}));

import { ConflictError, ForbiddenError, InvalidInputError, NotFoundError } from '../../server/core/errors';
import { createOfficeFixture, type OfficeFixture } from './fixtures';

describe('Meeting Room Catalog', () => {
  let f: OfficeFixture;

  beforeEach(() => {
    f = createOfficeFixture();
  });

  it('lets a super admin add rooms', async () => {
    const room = await f.services.rooms.create(f.superAdmin.id, { name: ' Board Room ', capacity: 12, location: 'Floor 3' });
    expect(room).toMatchObject({ name: 'Board Room', capacity: 12, location: 'Floor 3', retiredAt: null });
    expect(await f.services.rooms.list(f.alice.id)).toEqual([room]);
  });

  it('forbids device admins from managing rooms', async () => {
    await expect(f.services.rooms.create(f.deviceAdmin.id, { name: 'Board Room', capacity: 4 })).rejects.toBeInstanceOf(ForbiddenError);
  });

  it('requires a positive whole capacity', async () => {
    await expect(f.services.rooms.create(f.superAdmin.id, { name: 'Closet', capacity: 0 })).rejects.toBeInstanceOf(InvalidInputError);
    await expect(f.services.rooms.create(f.superAdmin.id, { name: 'Closet', capacity: 2.5 })).rejects.toBeInstanceOf(InvalidInputError);
  });

  it('updates capacity without touching the name', async () => {
    const room = await f.services.rooms.create(f.superAdmin.id, { name: 'Board Room', capacity: 8 });
    const updated = await f.services.rooms.update(f.superAdmin.id, room.id, { capacity: 10 });
    expect(updated).toMatchObject({ name: 'Board Room', capacity: 10 });
  });

  it('refuses to retire a room with a confirmed booking still to come', async () => {
    const room = await f.services.rooms.create(f.superAdmin.id, { name: 'Board Room', capacity: 8 });
    await f.services.bookings.create(f.alice.id, {
      roomId: room.id,
      startAt: '2030-01-16T10:00:00.000Z',
      endAt: '2030-01-16T11:00:00.000Z',
    });
    await expect(f.services.rooms.retire(f.superAdmin.id, room.id)).rejects.toBeInstanceOf(ConflictError);

    f.clock.set('2030-01-16T11:00:00.000Z');
    const retired = await f.services.rooms.retire(f.superAdmin.id, room.id);
    expect(retired.retiredAt).toEqual(new Date('2030-01-16T11:00:00.000Z'));
    await expect(f.services.rooms.get(f.alice.id, room.id)).rejects.toBeInstanceOf(NotFoundError);
  });
});
