import type {
  Device,
  DeviceRequest,
  Employee,
  LeaveRequest,
  MeetingRoom,
  RoomBooking,
} from '../../../shared/schema';
import type { EmployeeRole } from '../../../shared/constants/roles';
import { ACTIVE_DEVICE_REQUEST_STATUSES } from '../../../shared/constants/statuses';
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
  SortOrder,
  Transition,
} from './types';
import { translateStoreError } from './storeErrors';
import { intervalsOverlap } from '../meetingRoomService/intervals';

interface MemoryState {
  employees: Map<number, Employee>;
  devices: Map<number, Device>;
  deviceRequests: Map<number, DeviceRequest>;
  rooms: Map<number, MeetingRoom>;
  bookings: Map<number, RoomBooking>;
  leaves: Map<number, LeaveRequest>;
  sequences: Record<'employees' | 'devices' | 'deviceRequests' | 'rooms' | 'bookings' | 'leaves', number>;
}

function createState(): MemoryState {
  return {
    employees: new Map(),
    devices: new Map(),
    deviceRequests: new Map(),
    rooms: new Map(),
    bookings: new Map(),
    leaves: new Map(),
    sequences: { employees: 0, devices: 0, deviceRequests: 0, rooms: 0, bookings: 0, leaves: 0 },
  };
}

function byTime<T extends { id: number }>(key: (row: T) => Date, order: SortOrder = 'asc') {
  const direction = order === 'asc' ? 1 : -1;
  return (a: T, b: T) => {
    const diff = key(a).getTime() - key(b).getTime();
    return (diff !== 0 ? diff : a.id - b.id) * direction;
  };
}

/**
 * Reads and writes one in-memory state. Lock options are accepted and ignored:
 * the owning store already runs transactions one at a time.
 */
class MemoryOfficeRepository implements OfficeRepository {
  constructor(protected readonly state: MemoryState) {}

  async findEmployee(id: number): Promise<Employee | null> {
    const row = this.state.employees.get(id);
    return row ? { ...row } : null;
  }

  async listDirectReportIds(supervisorId: number): Promise<number[]> {
    return [...this.state.employees.values()]
      .filter(e => e.supervisorId === supervisorId)
      .map(e => e.id)
      .sort((a, b) => a - b);
  }

  async findDevice(id: number, _options?: LockOptions): Promise<Device | null> {
    const row = this.state.devices.get(id);
    return row ? { ...row } : null;
  }

  async listDevices(): Promise<Device[]> {
    return [...this.state.devices.values()]
      .filter(d => d.retiredAt === null)
      .sort((a, b) => a.id - b.id)
      .map(d => ({ ...d }));
  }

  async insertDevice(input: NewDevice, at: Date): Promise<Device> {
    const id = ++this.state.sequences.devices;
    const row: Device = { id, ...input, createdAt: at, updatedAt: at, retiredAt: null };
    this.state.devices.set(id, row);
    return { ...row };
  }

  async updateDevice(id: number, patch: DevicePatch, at: Date): Promise<Device | null> {
    const row = this.state.devices.get(id);
    if (!row) return null;
    const updated: Device = { ...row, ...patch, updatedAt: at };
    this.state.devices.set(id, updated);
    return { ...updated };
  }

  async findDeviceRequest(id: number, _options?: LockOptions): Promise<DeviceRequest | null> {
    const row = this.state.deviceRequests.get(id);
    return row ? { ...row } : null;
  }

  async findActiveDeviceRequest(deviceId: number): Promise<DeviceRequest | null> {
    for (const row of this.state.deviceRequests.values()) {
      if (row.deviceId === deviceId && ACTIVE_DEVICE_REQUEST_STATUSES.includes(row.status)) {
        return { ...row };
      }
    }
    return null;
  }

  async listDeviceRequests(filter: DeviceRequestFilter): Promise<DeviceRequest[]> {
    return [...this.state.deviceRequests.values()]
      .filter(r => filter.requesterId === undefined || r.requesterId === filter.requesterId)
      .filter(r => !filter.deviceIds || filter.deviceIds.includes(r.deviceId))
      .filter(r => !filter.statuses || filter.statuses.includes(r.status))
      .sort(byTime(r => r.requestedAt, filter.order))
      .map(r => ({ ...r }));
  }

  async insertDeviceRequest(input: NewDeviceRequest, at: Date): Promise<DeviceRequest> {
    const active = await this.findActiveDeviceRequest(input.deviceId);
    if (active) {
      // Mirrors the partial unique index on device_requests(device_id).
      throw Object.assign(new Error('duplicate key value violates unique constraint "device_requests_one_active_idx"'), { code: '23505' });
    }
    const id = ++this.state.sequences.deviceRequests;
    const row: DeviceRequest = {
      id,
      deviceId: input.deviceId,
      requesterId: input.requesterId,
      status: 'pending',
      requestedAt: at,
      decidedBy: null,
      decidedAt: null,
      rejectReason: null,
      collectedAt: null,
      returnRequestedAt: null,
      returnConfirmedBy: null,
      returnedAt: null,
      cancelledBy: null,
      cancelledAt: null,
      updatedAt: at,
    };
    this.state.deviceRequests.set(id, row);
    return { ...row };
  }

  async transitionDeviceRequest(id: number, transition: Transition<DeviceRequest['status'], DeviceRequestPatch>): Promise<DeviceRequest | null> {
    const row = this.state.deviceRequests.get(id);
    if (!row || !transition.from.includes(row.status)) return null;
    const updated: DeviceRequest = { ...row, ...transition.patch, status: transition.to, updatedAt: transition.at };
    this.state.deviceRequests.set(id, updated);
    return { ...updated };
  }

  async findRoom(id: number, _options?: LockOptions): Promise<MeetingRoom | null> {
    const row = this.state.rooms.get(id);
    return row ? { ...row } : null;
  }

  async listRooms(): Promise<MeetingRoom[]> {
    return [...this.state.rooms.values()]
      .filter(r => r.retiredAt === null)
      .sort((a, b) => a.id - b.id)
      .map(r => ({ ...r }));
  }

  async insertRoom(input: NewMeetingRoom, at: Date): Promise<MeetingRoom> {
    const id = ++this.state.sequences.rooms;
    const row: MeetingRoom = { id, ...input, createdAt: at, updatedAt: at, retiredAt: null };
    this.state.rooms.set(id, row);
    return { ...row };
  }

  async updateRoom(id: number, patch: MeetingRoomPatch, at: Date): Promise<MeetingRoom | null> {
    const row = this.state.rooms.get(id);
    if (!row) return null;
    const updated: MeetingRoom = { ...row, ...patch, updatedAt: at };
    this.state.rooms.set(id, updated);
    return { ...updated };
  }

  async findBooking(id: number, _options?: LockOptions): Promise<RoomBooking | null> {
    const row = this.state.bookings.get(id);
    return row ? { ...row } : null;
  }

  async findOverlappingBooking(roomId: number, startAt: Date, endAt: Date): Promise<RoomBooking | null> {
    const [first] = await this.listBookings({ roomId, statuses: ['confirmed'], overlapping: { startAt, endAt } });
    return first ?? null;
  }

  async listBookings(filter: BookingFilter): Promise<RoomBooking[]> {
    const { overlapping, endingAfter } = filter;
    return [...this.state.bookings.values()]
      .filter(b => filter.roomId === undefined || b.roomId === filter.roomId)
      .filter(b => filter.requesterId === undefined || b.requesterId === filter.requesterId)
      .filter(b => !filter.statuses || filter.statuses.includes(b.status))
      .filter(b => !overlapping || intervalsOverlap(b, overlapping))
      .filter(b => !endingAfter || b.endAt.getTime() > endingAfter.getTime())
      .sort(byTime(b => b.startAt, filter.order))
      .map(b => ({ ...b }));
  }

  async insertBooking(input: NewRoomBooking, at: Date): Promise<RoomBooking> {
    if (await this.findOverlappingBooking(input.roomId, input.startAt, input.endAt)) {
      // Mirrors the exclusion constraint on room_bookings.
      throw Object.assign(new Error('conflicting key value violates exclusion constraint "room_bookings_no_overlap"'), { code: '23P01' });
    }
    const id = ++this.state.sequences.bookings;
    const row: RoomBooking = {
      id,
      ...input,
      status: 'confirmed',
      createdAt: at,
      completedAt: null,
      cancelledAt: null,
      updatedAt: at,
    };
    this.state.bookings.set(id, row);
    return { ...row };
  }

  async transitionBooking(id: number, transition: Transition<RoomBooking['status'], RoomBookingPatch>): Promise<RoomBooking | null> {
    const row = this.state.bookings.get(id);
    if (!row || !transition.from.includes(row.status)) return null;
    const updated: RoomBooking = { ...row, ...transition.patch, status: transition.to, updatedAt: transition.at };
    this.state.bookings.set(id, updated);
    return { ...updated };
  }

  async findLeave(id: number, _options?: LockOptions): Promise<LeaveRequest | null> {
    const row = this.state.leaves.get(id);
    return row ? { ...row } : null;
  }

  async listLeaves(filter: LeaveFilter): Promise<LeaveRequest[]> {
    return [...this.state.leaves.values()]
      .filter(l => !filter.requesterIds || filter.requesterIds.includes(l.requesterId))
      .filter(l => !filter.statuses || filter.statuses.includes(l.status))
      .sort(byTime(l => l.createdAt, filter.order))
      .map(l => ({ ...l }));
  }

  async insertLeave(input: NewLeaveRequest, at: Date): Promise<LeaveRequest> {
    const id = ++this.state.sequences.leaves;
    const row: LeaveRequest = {
      id,
      ...input,
      status: 'pending',
      decidedBy: null,
      decidedAt: null,
      rejectReason: null,
      cancelledBy: null,
      createdAt: at,
      updatedAt: at,
    };
    this.state.leaves.set(id, row);
    return { ...row };
  }

  async transitionLeave(id: number, transition: Transition<LeaveRequest['status'], LeaveRequestPatch>): Promise<LeaveRequest | null> {
    const row = this.state.leaves.get(id);
    if (!row || !transition.from.includes(row.status)) return null;
    const updated: LeaveRequest = { ...row, ...transition.patch, status: transition.to, updatedAt: transition.at };
    this.state.leaves.set(id, updated);
    return { ...updated };
  }
}

export interface SeedEmployee {
  username: string;
  name: string;
  role?: EmployeeRole;
  supervisorId?: number | null;
  isActive?: boolean;
  department?: string | null;
}

/**
 * In-process store for local runs and tests. Transactions run one at a time
 * behind a promise-chain mutex and roll back by restoring a snapshot taken on entry.
 * Reads outside a transaction can observe one that is still in flight.
 */
export class MemoryOfficeStore extends MemoryOfficeRepository implements OfficeStore {
  private tail: Promise<void> = Promise.resolve();

  constructor() {
    super(createState());
  }

  addEmployee(input: SeedEmployee, at: Date = new Date()): Employee {
    const id = ++this.state.sequences.employees;
    const row: Employee = {
      id,
      username: input.username,
      employeeNo: `EMP${String(id).padStart(6, '0')}`,
      name: input.name,
      email: null,
      department: input.department ?? null,
      position: null,
      supervisorId: input.supervisorId ?? null,
      role: input.role ?? 'employee',
      isActive: input.isActive ?? true,
      createdAt: at,
      updatedAt: at,
    };
    this.state.employees.set(id, row);
    return { ...row };
  }

  async transaction<T>(work: (tx: OfficeRepository) => Promise<T>): Promise<T> {
    const release = await this.acquire();
    const snapshot = structuredClone(this.state);
    try {
      return await work(new MemoryOfficeRepository(this.state));
    } catch (error: unknown) {
      Object.assign(this.state, snapshot);
      throw translateStoreError(error);
    } finally {
      release();
    }
  }

  async ping(): Promise<void> {}

  async close(): Promise<void> {}

  private async acquire(): Promise<() => void> {
    const previous = this.tail;
    let release: () => void = () => {};
    this.tail = new Promise<void>(resolve => {
      release = resolve;
    });
    await previous;
    return release;
  }
}
