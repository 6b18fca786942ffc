export const DEVICE_REQUEST_STATUSES = [
  'pending',
  'approved',
  'rejected',
  'collected',
  'return_pending',
  'returned',
  'cancelled'
] as const;

export type DeviceRequestStatus = typeof DEVICE_REQUEST_STATUSES[number];

export const ACTIVE_DEVICE_REQUEST_STATUSES: DeviceRequestStatus[] = ['pending', 'approved', 'collected', 'return_pending'];
export const TERMINAL_DEVICE_REQUEST_STATUSES: DeviceRequestStatus[] = ['rejected', 'returned', 'cancelled'];

export const DEVICE_STATUSES = ['available', 'under_request', 'borrowed'] as const;
export type DeviceStatus = typeof DEVICE_STATUSES[number];

export const BOOKING_STATUSES = [
  'confirmed',
  'completed',
  'cancelled'
] as const;

export type BookingStatus = typeof BOOKING_STATUSES[number];

export const LEAVE_STATUSES = [
  'pending',
  'approved',
  'rejected',
  'cancelled'
] as const;

export type LeaveStatus = typeof LEAVE_STATUSES[number];

export const LEAVE_TYPES = [
  'annual',
  'sick',
  'personal',
  'marriage',
  'maternity',
  'bereavement'
] as const;

export type LeaveType = typeof LEAVE_TYPES[number];
