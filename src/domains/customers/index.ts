// Customers domain exports
export * from "./controllers/customer.controller";
export * from "./services/customer.service";
export * from "./repositories/customer.repository";
export * from "./repositories/in-memory-customer.repository";
export * from "./repositories/mysql-customer.repository";
export * from "./models/customer.model";
export * from "./validators/customer.validator";
export * from "./routes/customer.routes";
