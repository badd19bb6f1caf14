// Appointments domain exports
export * from "./controllers/appointment.controller";
export * from "./controllers/booking-response";
export * from "./services/booking.service";
export * from "./services/availability.service";
export * from "./services/conflict-checker.service";
export * from "./services/access-policy";
export * from "./repositories/appointment.repository";
export * from "./models/appointment.model";
export * from "./models/appointment.errors";
export * from "./models/booking-policy";
export * from "./types/booking.types";
export * from "./validators/appointment.validator";
export * from "./routes/appointment.routes";
