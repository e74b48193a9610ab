// Appointments domain exports
export * from "./controllers/appointment.controller";
export * from "./services/appointment.service";
export * from "./services/conflict-checker.service";
export * from "./repositories/appointment.repository";
export * from "./repositories/in-memory-appointment.repository";
export * from "./repositories/mysql-appointment.repository";
export * from "./models/appointment.model";
export * from "./validators/appointment.validator";
export * from "./routes/appointment.routes";
