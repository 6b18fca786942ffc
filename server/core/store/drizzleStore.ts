import { and, asc, desc, eq, gt, inArray, isNull, lt, sql, SQL } from 'drizzle-orm';
import type { PgDatabase } from 'drizzle-orm/pg-core';
import type { NodePgQueryResultHKT } from 'drizzle-orm/node-postgres';
import * as schema from '../../../shared/schema';
import {
  devices,
  deviceRequests,
  employees,
  leaveRequests,
  meetingRooms,
  roomBookings,
  type Device,
  type DeviceRequest,
  type Employee,
  type LeaveRequest,
  type MeetingRoom,
  type RoomBooking,
} from '../../../shared/schema';
import { ACTIVE_DEVICE_REQUEST_STATUSES } from '../../../shared/constants/statuses';
import { pool, queryWithRetry } from '../db';
import { logger } from '../logger';
import { translateStoreError } from './storeErrors';
import type {
  BookingFilter,
  DevicePatch,
  DeviceRequestFilter,
  DeviceRequestPatch,
  LeaveFilter,
  LeaveRequestPatch,
  LockOptions,
  MeetingRoomPatch,
  NewDevice,
  NewDeviceRequest,
  NewLeaveRequest,
  NewMeetingRoom,
  NewRoomBooking,
  OfficeRepository,
  OfficeStore,
  RoomBookingPatch,
  Transition,
} from './types';

// Both the pooled database and a transaction handle satisfy this.
type DbExecutor = PgDatabase<NodePgQueryResultHKT, typeof schema>;

class DrizzleOfficeRepository implements OfficeRepository {
  constructor(protected readonly db: DbExecutor) {}

  async findEmployee(id: number): Promise<Employee | null> {
    const [row] = await this.db.select().from(employees).where(eq(employees.id, id));
    return row ?? null;
  }

  async listDirectReportIds(supervisorId: number): Promise<number[]> {
    const rows = await this.db.select({ id: employees.id })
      .from(employees)
      .where(eq(employees.supervisorId, supervisorId))
      .orderBy(asc(employees.id));
    return rows.map(r => r.id);
  }

  async findDevice(id: number, options?: LockOptions): Promise<Device | null> {
    const query = this.db.select().from(devices).where(eq(devices.id, id));
    const [row] = options?.forUpdate ? await query.for('update') : await query;
    return row ?? null;
  }

  async listDevices(): Promise<Device[]> {
    return this.db.select().from(devices).where(isNull(devices.retiredAt)).orderBy(asc(devices.id));
  }

  async insertDevice(input: NewDevice, at: Date): Promise<Device> {
    const [row] = await this.db.insert(devices)
      .values({ ...input, createdAt: at, updatedAt: at })
      .returning();
    return row;
  }

  async updateDevice(id: number, patch: DevicePatch, at: Date): Promise<Device | null> {
    const [row] = await this.db.update(devices)
      .set({ ...patch, updatedAt: at })
      .where(eq(devices.id, id))
      .returning();
    return row ?? null;
  }

  async findDeviceRequest(id: number, options?: LockOptions): Promise<DeviceRequest | null> {
    const query = this.db.select().from(deviceRequests).where(eq(deviceRequests.id, id));
    const [row] = options?.forUpdate ? await query.for('update') : await query;
    return row ?? null;
  }

  async findActiveDeviceRequest(deviceId: number): Promise<DeviceRequest | null> {
    const [row] = await this.db.select()
      .from(deviceRequests)
      .where(and(
        eq(deviceRequests.deviceId, deviceId),
        inArray(deviceRequests.status, [...ACTIVE_DEVICE_REQUEST_STATUSES])
      ))
      .limit(1);
    return row ?? null;
  }

  async listDeviceRequests(filter: DeviceRequestFilter): Promise<DeviceRequest[]> {
    const conditions: SQL[] = [];
    if (filter.requesterId !== undefined) conditions.push(eq(deviceRequests.requesterId, filter.requesterId));
    if (filter.deviceIds) conditions.push(inArray(deviceRequests.deviceId, filter.deviceIds));
    if (filter.statuses) conditions.push(inArray(deviceRequests.status, filter.statuses));
    const direction = filter.order === 'desc' ? desc : asc;
    return this.db.select()
      .from(deviceRequests)
      .where(and(...conditions))
      .orderBy(direction(deviceRequests.requestedAt), direction(deviceRequests.id));
  }

  async insertDeviceRequest(input: NewDeviceRequest, at: Date): Promise<DeviceRequest> {
    const [row] = await this.db.insert(deviceRequests)
      .values({ ...input, status: 'pending', requestedAt: at, updatedAt: at })
      .returning();
    return row;
  }

  async transitionDeviceRequest(id: number, transition: Transition<DeviceRequest['status'], DeviceRequestPatch>): Promise<DeviceRequest | null> {
    const [row] = await this.db.update(deviceRequests)
      .set({ ...transition.patch, status: transition.to, updatedAt: transition.at })
      .where(and(eq(deviceRequests.id, id), inArray(deviceRequests.status, [...transition.from])))
      .returning();
    return row ?? null;
  }

  async findRoom(id: number, options?: LockOptions): Promise<MeetingRoom | null> {
    const query = this.db.select().from(meetingRooms).where(eq(meetingRooms.id, id));
    const [row] = options?.forUpdate ? await query.for('update') : await query;
    return row ?? null;
  }

  async listRooms(): Promise<MeetingRoom[]> {
    return this.db.select().from(meetingRooms).where(isNull(meetingRooms.retiredAt)).orderBy(asc(meetingRooms.id));
  }

  async insertRoom(input: NewMeetingRoom, at: Date): Promise<MeetingRoom> {
    const [row] = await this.db.insert(meetingRooms)
      .values({ ...input, createdAt: at, updatedAt: at })
      .returning();
    return row;
  }

  async updateRoom(id: number, patch: MeetingRoomPatch, at: Date): Promise<MeetingRoom | null> {
    const [row] = await this.db.update(meetingRooms)
      .set({ ...patch, updatedAt: at })
      .where(eq(meetingRooms.id, id))
      .returning();
    return row ?? null;
  }

  async findBooking(id: number, options?: LockOptions): Promise<RoomBooking | null> {
    const query = this.db.select().from(roomBookings).where(eq(roomBookings.id, id));
    const [row] = options?.forUpdate ? await query.for('update') : await query;
    return row ?? null;
  }

  async findOverlappingBooking(roomId: number, startAt: Date, endAt: Date): Promise<RoomBooking | null> {
    const [row] = await this.listBookings({ roomId, statuses: ['confirmed'], overlapping: { startAt, endAt } });
    return row ?? null;
  }

  async listBookings(filter: BookingFilter): Promise<RoomBooking[]> {
    const conditions: SQL[] = [];
    if (filter.roomId !== undefined) conditions.push(eq(roomBookings.roomId, filter.roomId));
    if (filter.requesterId !== undefined) conditions.push(eq(roomBookings.requesterId, filter.requesterId));
    if (filter.statuses) conditions.push(inArray(roomBookings.status, filter.statuses));
    if (filter.overlapping) {
      // Half-open overlap: existing.start < new.end AND existing.end > new.start
      conditions.push(lt(roomBookings.startAt, filter.overlapping.endAt));
      conditions.push(gt(roomBookings.endAt, filter.overlapping.startAt));
    }
    if (filter.endingAfter) conditions.push(gt(roomBookings.endAt, filter.endingAfter));
    const direction = filter.order === 'desc' ? desc : asc;
    return this.db.select()
      .from(roomBookings)
      .where(and(...conditions))
      .orderBy(direction(roomBookings.startAt), direction(roomBookings.id));
  }

  async insertBooking(input: NewRoomBooking, at: Date): Promise<RoomBooking> {
    const [row] = await this.db.insert(roomBookings)
      .values({ ...input, status: 'confirmed', createdAt: at, updatedAt: at })
      .returning();
    return row;
  }

  async transitionBooking(id: number, transition: Transition<RoomBooking['status'], RoomBookingPatch>): Promise<RoomBooking | null> {
    const [row] = await this.db.update(roomBookings)
      .set({ ...transition.patch, status: transition.to, updatedAt: transition.at })
      .where(and(eq(roomBookings.id, id), inArray(roomBookings.status, [...transition.from])))
      .returning();
    return row ?? null;
  }

  async findLeave(id: number, options?: LockOptions): Promise<LeaveRequest | null> {
    const query = this.db.select().from(leaveRequests).where(eq(leaveRequests.id, id));
    const [row] = options?.forUpdate ? await query.for('update') : await query;
    return row ?? null;
  }

  async listLeaves(filter: LeaveFilter): Promise<LeaveRequest[]> {
    const conditions: SQL[] = [];
    if (filter.requesterIds) conditions.push(inArray(leaveRequests.requesterId, filter.requesterIds));
    if (filter.statuses) conditions.push(inArray(leaveRequests.status, filter.statuses));
    const direction = filter.order === 'desc' ? desc : asc;
    return this.db.select()
      .from(leaveRequests)
      .where(and(...conditions))
      .orderBy(direction(leaveRequests.createdAt), direction(leaveRequests.id));
  }

  async insertLeave(input: NewLeaveRequest, at: Date): Promise<LeaveRequest> {
    const [row] = await this.db.insert(leaveRequests)
      .values({ ...input, status: 'pending', createdAt: at, updatedAt: at })
      .returning();
    return row;
  }

  async transitionLeave(id: number, transition: Transition<LeaveRequest['status'], LeaveRequestPatch>): Promise<LeaveRequest | null> {
    const [row] = await this.db.update(leaveRequests)
      .set({ ...transition.patch, status: transition.to, updatedAt: transition.at })
      .where(and(eq(leaveRequests.id, id), inArray(leaveRequests.status, [...transition.from])))
      .returning();
    return row ?? null;
  }
}

export interface DrizzleOfficeStoreOptions {
  transactionTimeoutMs: number;
}

export class DrizzleOfficeStore extends DrizzleOfficeRepository implements OfficeStore {
  private readonly timeoutMs: number;

  constructor(database: DbExecutor, options: DrizzleOfficeStoreOptions) {
    super(database);
    this.timeoutMs = Math.trunc(options.transactionTimeoutMs);
  }

  async transaction<T>(work: (tx: OfficeRepository) => Promise<T>): Promise<T> {
    try {
      return await this.db.transaction(async (tx) => {
        // SET LOCAL takes no bind parameters; timeoutMs is an integer from validated config.
        await tx.execute(sql.raw(`SET LOCAL lock_timeout = ${this.timeoutMs}`));
        await tx.execute(sql.raw(`SET LOCAL statement_timeout = ${this.timeoutMs}`));
        return work(new DrizzleOfficeRepository(tx));
      }, { isolationLevel: 'read committed' });
    } catch (error: unknown) {
      throw translateStoreError(error);
    }
  }

  async ping(): Promise<void> {
    await queryWithRetry('SELECT 1');
  }

  async close(): Promise<void> {
    try {
      await pool.end();
    } catch (error: unknown) {
      logger.warn('[Database] Pool shutdown failed', { error: error instanceof Error ? error : String(error) });
    }
  }
}
