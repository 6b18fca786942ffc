import type { MeetingRoom } from '../../../shared/schema';
import { assertPermission, resolveActiveActor } from '../approvalGate';
import { ConflictError, InvalidInputError, NotFoundError } from '../errors';
import { logger } from '../logger';
import type { ServiceContext } from '../serviceContext';

export interface MeetingRoomInput {
  name: string;
  capacity: number;
  location?: string | null;
}

function normalizeName(name: string): string {
  const trimmed = name.trim();
  if (!trimmed) {
    throw new InvalidInputError('Room name is required');
  }
  return trimmed;
}

function checkCapacity(capacity: number): number {
  if (!Number.isInteger(capacity) || capacity < 1) {
    throw new InvalidInputError('Capacity must be a positive integer', { capacity });
  }
  return capacity;
}

export class RoomCatalogService {
  constructor(private readonly ctx: ServiceContext) {}

  async list(actorId: number): Promise<MeetingRoom[]> {
    await resolveActiveActor(this.ctx.directory, actorId);
    return this.ctx.store.listRooms();
  }

  async get(actorId: number, roomId: number): Promise<MeetingRoom> {
    await resolveActiveActor(this.ctx.directory, actorId);
    const room = await this.ctx.store.findRoom(roomId);
    if (!room || room.retiredAt) {
      throw new NotFoundError('Meeting room not found', { roomId });
    }
    return room;
  }

  async create(actorId: number, input: MeetingRoomInput): Promise<MeetingRoom> {
    const actor = await resolveActiveActor(this.ctx.directory, actorId);
    assertPermission(actor, 'room.manage');
    const room = await this.ctx.store.transaction(tx => tx.insertRoom({
      name: normalizeName(input.name),
      capacity: checkCapacity(input.capacity),
      location: input.location ?? null,
    }, this.ctx.now()));
    logger.info('[Rooms] Room created', { actorId: actor.id, roomId: room.id });
    return room;
  }

  async update(actorId: number, roomId: number, input: Partial<MeetingRoomInput>): Promise<MeetingRoom> {
    const actor = await resolveActiveActor(this.ctx.directory, actorId);
    assertPermission(actor, 'room.manage');
    const at = this.ctx.now();
    const room = await this.ctx.store.transaction(async (tx) => {
      const existing = await tx.findRoom(roomId, { forUpdate: true });
      if (!existing || existing.retiredAt) {
        throw new NotFoundError('Meeting room not found', { roomId });
      }
      const updated = await tx.updateRoom(roomId, {
        ...(input.name !== undefined && { name: normalizeName(input.name) }),
        ...(input.capacity !== undefined && { capacity: checkCapacity(input.capacity) }),
        ...(input.location !== undefined && { location: input.location }),
      }, at);
      if (!updated) {
        throw new NotFoundError('Meeting room not found', { roomId });
      }
      return updated;
    });
    logger.info('[Rooms] Room updated', { actorId: actor.id, roomId });
    return room;
  }

  /** Soft delete; refused while a confirmed booking has not yet ended. */
  async retire(actorId: number, roomId: number): Promise<MeetingRoom> {
    const actor = await resolveActiveActor(this.ctx.directory, actorId);
    assertPermission(actor, 'room.manage');
    const at = this.ctx.now();
    const room = await this.ctx.store.transaction(async (tx) => {
      const existing = await tx.findRoom(roomId, { forUpdate: true });
      if (!existing || existing.retiredAt) {
        throw new NotFoundError('Meeting room not found', { roomId });
      }
      const upcoming = await tx.listBookings({ roomId, statuses: ['confirmed'], endingAfter: at });
      if (upcoming.length > 0) {
        throw new ConflictError('Room has upcoming confirmed bookings', { roomId, upcoming: upcoming.length });
      }
      const updated = await tx.updateRoom(roomId, { retiredAt: at }, at);
      if (!updated) {
        throw new NotFoundError('Meeting room not found', { roomId });
      }
      return updated;
    });
    logger.info('[Rooms] Room retired', { actorId: actor.id, roomId });
    return room;
  }
}
