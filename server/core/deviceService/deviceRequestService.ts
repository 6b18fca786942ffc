import type { DeviceRequest } from '../../../shared/schema';
import type { ActorProfile } from '../actorDirectory';
import { assertOwner, assertPermission, resolveActiveActor, type Permission } from '../approvalGate';
import { ConflictError, InvalidTransitionError, NotFoundError } from '../errors';
import { logger } from '../logger';
import type { ServiceContext } from '../serviceContext';
import type { DeviceRequestPatch } from '../store/types';
import { assertCanApply, type DeviceRequestAction } from './stateMachine';

interface TransitionPolicy {
  /** Role gate checked before the request is loaded. */
  permission?: Permission;
  /** Only the original requester may apply the action. */
  requesterOnly?: boolean;
  patch: (actor: ActorProfile, at: Date) => DeviceRequestPatch;
}

export class DeviceRequestService {
  constructor(private readonly ctx: ServiceContext) {}

  async create(actorId: number, deviceId: number): Promise<DeviceRequest> {
    const actor = await resolveActiveActor(this.ctx.directory, actorId);
    const at = this.ctx.now();

    const request = await this.ctx.store.transaction(async (tx) => {
      const device = await tx.findDevice(deviceId, { forUpdate: true });
      if (!device || device.retiredAt) {
        throw new NotFoundError('Device not found', { deviceId });
      }
      const active = await tx.findActiveDeviceRequest(deviceId);
      if (active) {
        throw new ConflictError('Device already has an active request', { deviceId, activeRequestId: active.id });
      }
      return tx.insertDeviceRequest({ deviceId, requesterId: actor.id }, at);
    });

    logger.info('[DeviceRequests] Request created', {
      actorId: actor.id,
      deviceId,
      deviceRequestId: request.id,
      status: request.status,
    });
    return request;
  }

  approve(actorId: number, requestId: number): Promise<DeviceRequest> {
    return this.apply(actorId, requestId, 'approve', {
      permission: 'device.decide',
      patch: (actor, at) => ({ decidedBy: actor.id, decidedAt: at }),
    });
  }

  reject(actorId: number, requestId: number, reason?: string | null): Promise<DeviceRequest> {
    const rejectReason = reason?.trim() || null;
    return this.apply(actorId, requestId, 'reject', {
      permission: 'device.decide',
      patch: (actor, at) => ({ decidedBy: actor.id, decidedAt: at, rejectReason }),
    });
  }

  collect(actorId: number, requestId: number): Promise<DeviceRequest> {
    return this.apply(actorId, requestId, 'collect', {
      requesterOnly: true,
      patch: (_actor, at) => ({ collectedAt: at }),
    });
  }

  initiateReturn(actorId: number, requestId: number): Promise<DeviceRequest> {
    return this.apply(actorId, requestId, 'initiateReturn', {
      requesterOnly: true,
      patch: (_actor, at) => ({ returnRequestedAt: at }),
    });
  }

  confirmReturn(actorId: number, requestId: number): Promise<DeviceRequest> {
    return this.apply(actorId, requestId, 'confirmReturn', {
      permission: 'device.confirmReturn',
      patch: (actor, at) => ({ returnConfirmedBy: actor.id, returnedAt: at }),
    });
  }

  cancel(actorId: number, requestId: number): Promise<DeviceRequest> {
    return this.apply(actorId, requestId, 'cancel', {
      requesterOnly: true,
      patch: (actor, at) => ({ cancelledBy: actor.id, cancelledAt: at }),
    });
  }

  adminCancel(actorId: number, requestId: number): Promise<DeviceRequest> {
    return this.apply(actorId, requestId, 'adminCancel', {
      permission: 'device.adminCancel',
      patch: (actor, at) => ({ cancelledBy: actor.id, cancelledAt: at }),
    });
  }

  async listMine(actorId: number): Promise<DeviceRequest[]> {
    const actor = await resolveActiveActor(this.ctx.directory, actorId);
    return this.ctx.store.listDeviceRequests({ requesterId: actor.id, order: 'desc' });
  }

  async listPending(actorId: number): Promise<DeviceRequest[]> {
    const actor = await resolveActiveActor(this.ctx.directory, actorId);
    assertPermission(actor, 'device.viewQueues');
    return this.ctx.store.listDeviceRequests({ statuses: ['pending'], order: 'asc' });
  }

  async listReturnPending(actorId: number): Promise<DeviceRequest[]> {
    const actor = await resolveActiveActor(this.ctx.directory, actorId);
    assertPermission(actor, 'device.viewQueues');
    return this.ctx.store.listDeviceRequests({ statuses: ['return_pending'], order: 'asc' });
  }

  private async apply(
    actorId: number,
    requestId: number,
    action: DeviceRequestAction,
    policy: TransitionPolicy
  ): Promise<DeviceRequest> {
    const actor = await resolveActiveActor(this.ctx.directory, actorId);
    if (policy.permission) {
      assertPermission(actor, policy.permission);
    }
    const at = this.ctx.now();

    const updated = await this.ctx.store.transaction(async (tx) => {
      const request = await tx.findDeviceRequest(requestId, { forUpdate: true });
      if (!request) {
        throw new NotFoundError('Device request not found', { deviceRequestId: requestId });
      }
      if (policy.requesterOnly) {
        assertOwner(actor, request.requesterId, 'device request');
      }
      const rule = assertCanApply(action, request);
      const result = await tx.transitionDeviceRequest(requestId, {
        from: rule.from,
        to: rule.to,
        patch: policy.patch(actor, at),
        at,
      });
      if (!result) {
        throw new InvalidTransitionError('Device request changed concurrently', { deviceRequestId: requestId, action });
      }
      return result;
    });

    logger.info(`[DeviceRequests] ${action} applied`, {
      actorId: actor.id,
      deviceId: updated.deviceId,
      deviceRequestId: updated.id,
      status: updated.status,
    });
    return updated;
  }
}
