export * from "./models/auth-session";
export * from "./models/inventory";
export * from "./models/scheduling";
export * from "./models/leave";
