import { index, pgTable, timestamp, varchar, serial, text, integer } from "drizzle-orm/pg-core";
import type { DeviceRequestStatus } from "../constants/statuses";

// Borrowable devices. Availability is derived from device_requests, never stored.
export const devices = pgTable("devices", {
  id: serial("id").primaryKey(),
  name: varchar("name", { length: 100 }).notNull(),
  type: varchar("type", { length: 50 }),
  description: text("description"),
  createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
  retiredAt: timestamp("retired_at", { withTimezone: true }),
});

// One borrow request for one device. Rows are transitioned, never deleted.
// The single-active-request rule is backed by a partial unique index created in db-init.
export const deviceRequests = pgTable("device_requests", {
  id: serial("id").primaryKey(),
  deviceId: integer("device_id").notNull(),
  requesterId: integer("requester_id").notNull(),
  status: varchar("status", { length: 20 }).$type<DeviceRequestStatus>().notNull().default("pending"),
  requestedAt: timestamp("requested_at", { withTimezone: true }).notNull().defaultNow(),
  decidedBy: integer("decided_by"),
  decidedAt: timestamp("decided_at", { withTimezone: true }),
  rejectReason: text("reject_reason"),
  collectedAt: timestamp("collected_at", { withTimezone: true }),
  returnRequestedAt: timestamp("return_requested_at", { withTimezone: true }),
  returnConfirmedBy: integer("return_confirmed_by"),
  returnedAt: timestamp("returned_at", { withTimezone: true }),
  cancelledBy: integer("cancelled_by"),
  cancelledAt: timestamp("cancelled_at", { withTimezone: true }),
  updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
}, (table) => [
  index("device_requests_device_id_idx").on(table.deviceId),
  index("device_requests_requester_id_idx").on(table.requesterId),
  index("device_requests_status_idx").on(table.status),
]);

export type Device = typeof devices.$inferSelect;
export type InsertDevice = typeof devices.$inferInsert;
export type DeviceRequest = typeof deviceRequests.$inferSelect;
export type InsertDeviceRequest = typeof deviceRequests.$inferInsert;
