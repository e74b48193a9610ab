import { Router } from "express";
import { createAppointmentRoutes } from "@/domains/appointments";
import { createCustomerRoutes } from "@/domains/customers";
import { createDentistRoutes } from "@/domains/dentists";
import { createUserRoutes } from "@/domains/identity";
import type { Container } from "@/container";

export const createApiRoutes = (container: Container): Router => {
  const router = Router();

  // Mount domain routes
  router.use("/appointments", createAppointmentRoutes(container.controllers.appointments));
  router.use("/customers", createCustomerRoutes(container.controllers.customers));
  router.use("/dentists", createDentistRoutes(container.controllers.dentists));
  router.use("/users", createUserRoutes(container.controllers.users));

  return router;
};
