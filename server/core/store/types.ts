import type {
  Device,
  DeviceRequest,
  Employee,
  LeaveRequest,
  MeetingRoom,
  RoomBooking,
} from '../../../shared/schema';
import type { BookingStatus, DeviceRequestStatus, LeaveStatus, LeaveType } from '../../../shared/constants/statuses';

export interface LockOptions {
  /** Take a row lock held until the surrounding transaction ends. */
  forUpdate?: boolean;
}

export type SortOrder = 'asc' | 'desc';

export interface DeviceRequestFilter {
  requesterId?: number;
  deviceIds?: number[];
  statuses?: DeviceRequestStatus[];
  order?: SortOrder;
}

export interface BookingFilter {
  roomId?: number;
  requesterId?: number;
  statuses?: BookingStatus[];
  /** Keep bookings whose [startAt, endAt) intersects this half-open window. */
  overlapping?: { startAt: Date; endAt: Date };
  endingAfter?: Date;
  order?: SortOrder;
}

export interface LeaveFilter {
  requesterIds?: number[];
  statuses?: LeaveStatus[];
  order?: SortOrder;
}

export interface NewDevice {
  name: string;
  type: string | null;
  description: string | null;
}

export type DevicePatch = Partial<Pick<Device, 'name' | 'type' | 'description' | 'retiredAt'>>;

export interface NewDeviceRequest {
  deviceId: number;
  requesterId: number;
}

export type DeviceRequestPatch = Partial<Omit<DeviceRequest, 'id' | 'deviceId' | 'requesterId' | 'requestedAt' | 'status' | 'updatedAt'>>;

export interface NewMeetingRoom {
  name: string;
  capacity: number;
  location: string | null;
}

export type MeetingRoomPatch = Partial<Pick<MeetingRoom, 'name' | 'capacity' | 'location' | 'retiredAt'>>;

export interface NewRoomBooking {
  roomId: number;
  requesterId: number;
  title: string | null;
  startAt: Date;
  endAt: Date;
}

export type RoomBookingPatch = Partial<Pick<RoomBooking, 'completedAt' | 'cancelledAt'>>;

export interface NewLeaveRequest {
  requesterId: number;
  leaveType: LeaveType;
  startDate: string;
  endDate: string;
  reason: string | null;
}

export type LeaveRequestPatch = Partial<Pick<LeaveRequest, 'decidedBy' | 'decidedAt' | 'rejectReason' | 'cancelledBy'>>;

/**
 * Compare-and-set: the row moves to `to` only while its status is one of `from`.
 * Returns the updated row, or null when the id is unknown or the status moved on.
 */
export interface Transition<S extends string, P> {
  from: readonly S[];
  to: S;
  patch?: P;
  at: Date;
}

export interface OfficeRepository {
  findEmployee(id: number): Promise<Employee | null>;
  listDirectReportIds(supervisorId: number): Promise<number[]>;

  findDevice(id: number, options?: LockOptions): Promise<Device | null>;
  listDevices(): Promise<Device[]>;
  insertDevice(input: NewDevice, at: Date): Promise<Device>;
  updateDevice(id: number, patch: DevicePatch, at: Date): Promise<Device | null>;

  findDeviceRequest(id: number, options?: LockOptions): Promise<DeviceRequest | null>;
  findActiveDeviceRequest(deviceId: number): Promise<DeviceRequest | null>;
  listDeviceRequests(filter: DeviceRequestFilter): Promise<DeviceRequest[]>;
  insertDeviceRequest(input: NewDeviceRequest, at: Date): Promise<DeviceRequest>;
  transitionDeviceRequest(id: number, transition: Transition<DeviceRequestStatus, DeviceRequestPatch>): Promise<DeviceRequest | null>;

  findRoom(id: number, options?: LockOptions): Promise<MeetingRoom | null>;
  listRooms(): Promise<MeetingRoom[]>;
  insertRoom(input: NewMeetingRoom, at: Date): Promise<MeetingRoom>;
  updateRoom(id: number, patch: MeetingRoomPatch, at: Date): Promise<MeetingRoom | null>;

  findBooking(id: number, options?: LockOptions): Promise<RoomBooking | null>;
  findOverlappingBooking(roomId: number, startAt: Date, endAt: Date): Promise<RoomBooking | null>;
  listBookings(filter: BookingFilter): Promise<RoomBooking[]>;
  insertBooking(input: NewRoomBooking, at: Date): Promise<RoomBooking>;
  transitionBooking(id: number, transition: Transition<BookingStatus, RoomBookingPatch>): Promise<RoomBooking | null>;

  findLeave(id: number, options?: LockOptions): Promise<LeaveRequest | null>;
  listLeaves(filter: LeaveFilter): Promise<LeaveRequest[]>;
  insertLeave(input: NewLeaveRequest, at: Date): Promise<LeaveRequest>;
  transitionLeave(id: number, transition: Transition<LeaveStatus, LeaveRequestPatch>): Promise<LeaveRequest | null>;
}

export interface OfficeStore extends OfficeRepository {
  /**
   * Runs `work` as one all-or-nothing unit. Row locks taken through
   * `LockOptions.forUpdate` are held until it settles.
   */
  transaction<T>(work: (tx: OfficeRepository) => Promise<T>): Promise<T>;
  ping(): Promise<void>;
  close(): Promise<void>;
}
