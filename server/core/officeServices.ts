import { StoreActorDirectory, type ActorDirectory } from './actorDirectory';
import { DeviceCatalogService, DeviceRequestService } from './deviceService';
import { LeaveService } from './leaveService';
import { BookingService, RoomCatalogService } from './meetingRoomService';
import type { ServiceContext } from './serviceContext';
import type { OfficeStore } from './store/types';

export interface OfficeServicesOptions {
  timeZone: string;
  maxActiveBookingsPerEmployee: number;
  now?: () => Date;
  /** Defaults to the employee table behind `store`. */
  directory?: ActorDirectory;
}

export interface OfficeServices {
  store: OfficeStore;
  devices: DeviceCatalogService;
  deviceRequests: DeviceRequestService;
  rooms: RoomCatalogService;
  bookings: BookingService;
  leaves: LeaveService;
}

export function createOfficeServices(store: OfficeStore, options: OfficeServicesOptions): OfficeServices {
  const ctx: ServiceContext = {
    store,
    directory: options.directory ?? new StoreActorDirectory(store),
    now: options.now ?? (() => new Date()),
  };
  return {
    store,
    devices: new DeviceCatalogService(ctx),
    deviceRequests: new DeviceRequestService(ctx),
    rooms: new RoomCatalogService(ctx),
    bookings: new BookingService(ctx, {
      timeZone: options.timeZone,
      maxActivePerEmployee: options.maxActiveBookingsPerEmployee,
    }),
    leaves: new LeaveService(ctx),
  };
}
