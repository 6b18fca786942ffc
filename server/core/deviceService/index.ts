export {
  DEVICE_REQUEST_TRANSITIONS,
  canApply,
  deriveDeviceStatus,
  type DeviceRequestAction,
} from './stateMachine';

export { DeviceRequestService } from './deviceRequestService';

export {
  DeviceCatalogService,
  type DeviceInput,
  type DeviceView,
} from './deviceCatalog';
