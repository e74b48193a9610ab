// Dentists domain exports
export * from "./controllers/dentist.controller";
export * from "./services/dentist.service";
export * from "./repositories/dentist.repository";
export * from "./repositories/in-memory-dentist.repository";
export * from "./repositories/mysql-dentist.repository";
export * from "./models/dentist.model";
export * from "./validators/dentist.validator";
export * from "./routes/dentist.routes";
