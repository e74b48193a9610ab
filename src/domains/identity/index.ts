// Identity domain exports
export * from "./services/auth-api.client";
export * from "./services/user-management.service";
export * from "./handlers/user-created.handler";
export * from "./consumers/identity-event.consumer";
export * from "./controllers/user.controller";
export * from "./validators/user.validator";
export * from "./routes/user.routes";
