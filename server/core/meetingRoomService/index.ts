export {
  intervalsOverlap,
  resolveBookingInterval,
  type BookingTimes,
  type CalendarTimes,
  type InstantTimes,
  type Interval,
} from './intervals';

export {
  BookingService,
  type BookingServiceOptions,
  type CreateBookingInput,
  type RoomAvailability,
} from './bookingService';

export { RoomCatalogService, type MeetingRoomInput } from './roomCatalog';
