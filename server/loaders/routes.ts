import type { Express } from 'express';
import type { OfficeConfig } from '../core/config';
import type { OfficeServices } from '../core/officeServices';
import { logger } from '../core/logger';
import { createBookingRouter } from '../routes/bookings';
import { createDevAuthRouter } from '../routes/devAuth';
import { createDeviceRequestRouter } from '../routes/deviceRequests';
import { createDeviceRouter } from '../routes/devices';
import { createLeaveRouter } from '../routes/leaves';
import { createMeetingRoomRouter } from '../routes/meetingRooms';

export function registerRoutes(app: Express, services: OfficeServices, cfg: OfficeConfig): void {
  if (cfg.enableTestLogin) {
    app.use(createDevAuthRouter(services.store));
    logger.warn('[Startup] Test login enabled at /api/dev/login');
  }

  app.use(createDeviceRouter(services));
  app.use(createDeviceRequestRouter(services));
  app.use(createMeetingRoomRouter(services));
  app.use(createBookingRouter(services));
  app.use(createLeaveRouter(services));
}
