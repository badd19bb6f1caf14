// Doctors domain exports
export * from "./controllers/doctor.controller";
export * from "./repositories/doctor.repository";
export * from "./repositories/availability.repository";
export * from "./models/doctor.model";
export * from "./validators/doctor.validator";
export * from "./routes/doctor.routes";
