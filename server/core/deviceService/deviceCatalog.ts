import type { Device } from '../../../shared/schema';
import { ACTIVE_DEVICE_REQUEST_STATUSES, type DeviceStatus } from '../../../shared/constants/statuses';
import { assertPermission, resolveActiveActor } from '../approvalGate';
import { ConflictError, InvalidInputError, NotFoundError } from '../errors';
import { logger } from '../logger';
import type { ServiceContext } from '../serviceContext';
import type { OfficeRepository } from '../store/types';
import { deriveDeviceStatus } from './stateMachine';

export interface DeviceView extends Device {
  status: DeviceStatus;
  activeRequestId: number | null;
}

export interface DeviceInput {
  name: string;
  type?: string | null;
  description?: string | null;
}

function normalizeName(name: string): string {
  const trimmed = name.trim();
  if (!trimmed) {
    throw new InvalidInputError('Device name is required');
  }
  return trimmed;
}

async function withStatus(repository: OfficeRepository, devices: Device[]): Promise<DeviceView[]> {
  if (devices.length === 0) return [];
  const active = await repository.listDeviceRequests({
    deviceIds: devices.map(d => d.id),
    statuses: ACTIVE_DEVICE_REQUEST_STATUSES,
  });
  const activeByDevice = new Map(active.map(r => [r.deviceId, r]));
  return devices.map(device => {
    const request = activeByDevice.get(device.id);
    return {
      ...device,
      status: deriveDeviceStatus(request),
      activeRequestId: request?.id ?? null,
    };
  });
}

export class DeviceCatalogService {
  constructor(private readonly ctx: ServiceContext) {}

  async list(actorId: number): Promise<DeviceView[]> {
    await resolveActiveActor(this.ctx.directory, actorId);
    return withStatus(this.ctx.store, await this.ctx.store.listDevices());
  }

  async listAvailable(actorId: number): Promise<DeviceView[]> {
    const devices = await this.list(actorId);
    return devices.filter(d => d.status === 'available');
  }

  async get(actorId: number, deviceId: number): Promise<DeviceView> {
    await resolveActiveActor(this.ctx.directory, actorId);
    const device = await this.ctx.store.findDevice(deviceId);
    if (!device || device.retiredAt) {
      throw new NotFoundError('Device not found', { deviceId });
    }
    const [view] = await withStatus(this.ctx.store, [device]);
    return view;
  }

  async create(actorId: number, input: DeviceInput): Promise<Device> {
    const actor = await resolveActiveActor(this.ctx.directory, actorId);
    assertPermission(actor, 'device.manage');
    const device = await this.ctx.store.transaction(tx => tx.insertDevice({
      name: normalizeName(input.name),
      type: input.type ?? null,
      description: input.description ?? null,
    }, this.ctx.now()));
    logger.info('[Devices] Device created', { actorId: actor.id, deviceId: device.id });
    return device;
  }

  async update(actorId: number, deviceId: number, input: Partial<DeviceInput>): Promise<Device> {
    const actor = await resolveActiveActor(this.ctx.directory, actorId);
    assertPermission(actor, 'device.manage');
    const at = this.ctx.now();
    const device = await this.ctx.store.transaction(async (tx) => {
      const existing = await tx.findDevice(deviceId, { forUpdate: true });
      if (!existing || existing.retiredAt) {
        throw new NotFoundError('Device not found', { deviceId });
      }
      const updated = await tx.updateDevice(deviceId, {
        ...(input.name !== undefined && { name: normalizeName(input.name) }),
        ...(input.type !== undefined && { type: input.type }),
        ...(input.description !== undefined && { description: input.description }),
      }, at);
      if (!updated) {
        throw new NotFoundError('Device not found', { deviceId });
      }
      return updated;
    });
    logger.info('[Devices] Device updated', { actorId: actor.id, deviceId });
    return device;
  }

  /** Soft delete. Request history keeps pointing at the retired row. */
  async retire(actorId: number, deviceId: number): Promise<Device> {
    const actor = await resolveActiveActor(this.ctx.directory, actorId);
    assertPermission(actor, 'device.manage');
    const at = this.ctx.now();
    const device = await this.ctx.store.transaction(async (tx) => {
      const existing = await tx.findDevice(deviceId, { forUpdate: true });
      if (!existing || existing.retiredAt) {
        throw new NotFoundError('Device not found', { deviceId });
      }
      const active = await tx.findActiveDeviceRequest(deviceId);
      if (active) {
        throw new ConflictError('Device has an active request', { deviceId, activeRequestId: active.id });
      }
      const updated = await tx.updateDevice(deviceId, { retiredAt: at }, at);
      if (!updated) {
        throw new NotFoundError('Device not found', { deviceId });
      }
      return updated;
    });
    logger.info('[Devices] Device retired', { actorId: actor.id, deviceId });
    return device;
  }
}
