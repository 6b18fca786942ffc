import { describe, it, expect } from 'vitest';
import {
  DEVICE_REQUEST_TRANSITIONS,
  canApply,
  deriveDeviceStatus,
  type DeviceRequestAction,
} from '../../server/core/deviceService';
import { TERMINAL_DEVICE_REQUEST_STATUSES } from '../../shared/constants/statuses';

const ACTIONS: DeviceRequestAction[] = ['approve', 'reject', 'collect', 'initiateReturn', 'confirmReturn', 'cancel', 'adminCancel'];

describe('Device Request State Machine - transitions', () => {
  it('follows the borrow lifecycle', () => {
    expect(DEVICE_REQUEST_TRANSITIONS.approve).toEqual({ from: ['pending'], to: 'approved' });
    expect(DEVICE_REQUEST_TRANSITIONS.collect).toEqual({ from: ['approved'], to: 'collected' });
    expect(DEVICE_REQUEST_TRANSITIONS.initiateReturn).toEqual({ from: ['collected'], to: 'return_pending' });
    expect(DEVICE_REQUEST_TRANSITIONS.confirmReturn).toEqual({ from: ['return_pending'], to: 'returned' });
  });

  it('lets the requester cancel from pending or approved', () => {
    expect(canApply('cancel', 'pending')).toBe(true);
    expect(canApply('cancel', 'approved')).toBe(true);
    expect(canApply('cancel', 'collected')).toBe(false);
  });

  it('lets an admin cancel only pending requests', () => {
    expect(canApply('adminCancel', 'pending')).toBe(true);
    expect(canApply('adminCancel', 'approved')).toBe(false);
  });

  it('rejects only pending requests', () => {
    expect(canApply('reject', 'pending')).toBe(true);
    expect(canApply('reject', 'approved')).toBe(false);
  });

  it('allows nothing out of a terminal state', () => {
    for (const status of TERMINAL_DEVICE_REQUEST_STATUSES) {
      for (const action of ACTIONS) {
        expect(canApply(action, status)).toBe(false);
      }
    }
  });
});

describe('Device Request State Machine - derived device status', () => {
  it('is available without an active request', () => {
    expect(deriveDeviceStatus(null)).toBe('available');
    expect(deriveDeviceStatus(undefined)).toBe('available');
  });

  it('is under_request while pending or approved', () => {
    expect(deriveDeviceStatus({ status: 'pending' })).toBe('under_request');
    expect(deriveDeviceStatus({ status: 'approved' })).toBe('under_request');
  });

  it('is borrowed while collected or awaiting return confirmation', () => {
    expect(deriveDeviceStatus({ status: 'collected' })).toBe('borrowed');
    expect(deriveDeviceStatus({ status: 'return_pending' })).toBe('borrowed');
  });

  it('is available again once the request is terminal', () => {
    expect(deriveDeviceStatus({ status: 'returned' })).toBe('available');
    expect(deriveDeviceStatus({ status: 'rejected' })).toBe('available');
  });
});
