import type { DeviceRequest } from '../../../shared/schema';
import type { DeviceRequestStatus, DeviceStatus } from '../../../shared/constants/statuses';
import { InvalidTransitionError } from '../errors';

export type DeviceRequestAction =
  | 'approve'
  | 'reject'
  | 'collect'
  | 'initiateReturn'
  | 'confirmReturn'
  | 'cancel'
  | 'adminCancel';

export interface DeviceRequestTransitionRule {
  from: readonly DeviceRequestStatus[];
  to: DeviceRequestStatus;
}

//   pending --approve--> approved --collect--> collected --initiateReturn--> return_pending --confirmReturn--> returned
//   pending --reject--> rejected
//   pending|approved --cancel--> cancelled
//   pending --adminCancel--> cancelled
export const DEVICE_REQUEST_TRANSITIONS: Record<DeviceRequestAction, DeviceRequestTransitionRule> = {
  approve: { from: ['pending'], to: 'approved' },
  reject: { from: ['pending'], to: 'rejected' },
  collect: { from: ['approved'], to: 'collected' },
  initiateReturn: { from: ['collected'], to: 'return_pending' },
  confirmReturn: { from: ['return_pending'], to: 'returned' },
  cancel: { from: ['pending', 'approved'], to: 'cancelled' },
  adminCancel: { from: ['pending'], to: 'cancelled' },
};

export function canApply(action: DeviceRequestAction, status: DeviceRequestStatus): boolean {
  return DEVICE_REQUEST_TRANSITIONS[action].from.includes(status);
}

export function assertCanApply(action: DeviceRequestAction, request: Pick<DeviceRequest, 'id' | 'status'>): DeviceRequestTransitionRule {
  const rule = DEVICE_REQUEST_TRANSITIONS[action];
  if (!rule.from.includes(request.status)) {
    throw new InvalidTransitionError(
      `Cannot ${action} a device request that is ${request.status}`,
      { deviceRequestId: request.id, status: request.status, action }
    );
  }
  return rule;
}

/**
 * A device's status is a pure function of its single active request.
 */
export function deriveDeviceStatus(activeRequest: Pick<DeviceRequest, 'status'> | null | undefined): DeviceStatus {
  switch (activeRequest?.status) {
    case 'pending':
    case 'approved':
      return 'under_request';
    case 'collected':
    case 'return_pending':
      return 'borrowed';
    default:
      return 'available';
  }
}
