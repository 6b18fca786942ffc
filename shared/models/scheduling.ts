import { index, pgTable, timestamp, varchar, serial, integer } from "drizzle-orm/pg-core";
import type { BookingStatus } from "../constants/statuses";

// Meeting rooms. A room's schedule is derived from its bookings.
export const meetingRooms = pgTable("meeting_rooms", {
  id: serial("id").primaryKey(),
  name: varchar("name", { length: 100 }).notNull(),
  capacity: integer("capacity").notNull().default(1),
  location: varchar("location"),
  createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
  retiredAt: timestamp("retired_at", { withTimezone: true }),
});

// Room bookings on the half-open interval [start_at, end_at).
// Confirmed rows of one room never overlap; db-init adds the exclusion constraint.
export const roomBookings = pgTable("room_bookings", {
  id: serial("id").primaryKey(),
  roomId: integer("room_id").notNull(),
  requesterId: integer("requester_id").notNull(),
  title: varchar("title", { length: 200 }),
  startAt: timestamp("start_at", { withTimezone: true }).notNull(),
  endAt: timestamp("end_at", { withTimezone: true }).notNull(),
  status: varchar("status", { length: 20 }).$type<BookingStatus>().notNull().default("confirmed"),
  createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
  completedAt: timestamp("completed_at", { withTimezone: true }),
  cancelledAt: timestamp("cancelled_at", { withTimezone: true }),
  updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
}, (table) => [
  index("room_bookings_room_start_idx").on(table.roomId, table.startAt),
  index("room_bookings_requester_id_idx").on(table.requesterId),
]);

export type MeetingRoom = typeof meetingRooms.$inferSelect;
export type InsertMeetingRoom = typeof meetingRooms.$inferInsert;
export type RoomBooking = typeof roomBookings.$inferSelect;
export type InsertRoomBooking = typeof roomBookings.$inferInsert;
