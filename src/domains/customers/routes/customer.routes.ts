import { Router } from "express";
import { validateBody, validateParams, validateQuery } from "@/shared/middleware/validation.middleware";
import { generalRateLimit, createResourceRateLimit } from "@/shared/middleware/rate-limit.middleware";
import type { CustomerController } from "../controllers/customer.controller";
import { customerBodySchema, customerIdParamSchema, queryCustomersSchema } from "../validators/customer.validator";

export const createCustomerRoutes = (customerController: CustomerController): Router => {
  const router = Router();

  /**
   * @openapi
   * /customers:
   *   get:
   *     tags: [Customers]
   *     summary: List customers, optionally filtered by name, email or phone
   *     parameters:
   *       - { in: query, name: page, schema: { type: integer, default: 1 } }
   *       - { in: query, name: pageSize, schema: { type: integer, default: 10 } }
   *       - { in: query, name: search, schema: { type: string } }
   *     responses:
   *       200: { description: Paginated customers }
   */
  router.get("/", generalRateLimit, validateQuery(queryCustomersSchema), customerController.getCustomers);

  /**
   * @openapi
   * /customers/{id}:
   *   get:
   *     tags: [Customers]
   *     summary: Get a customer
   *     parameters:
   *       - { in: path, name: id, required: true, schema: { type: integer } }
   *     responses:
   *       200: { description: The customer }
   *       404: { description: Customer not found }
   */
  router.get("/:id", generalRateLimit, validateParams(customerIdParamSchema), customerController.getCustomer);

  /**
   * @openapi
   * /customers:
   *   post:
   *     tags: [Customers]
   *     summary: Register a customer and provision their user account
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema: { $ref: '#/components/schemas/CustomerRequest' }
   *     responses:
   *       201: { description: Customer created successfully. }
   *       400: { description: Name, email and phone are required. }
   *       409: { description: Email already in use }
   *       502: { description: Failed to create user account. }
   */
  router.post("/", createResourceRateLimit, validateBody(customerBodySchema), customerController.createCustomer);

  /**
   * @openapi
   * /customers/{id}:
   *   put:
   *     tags: [Customers]
   *     summary: Update a customer
   *     parameters:
   *       - { in: path, name: id, required: true, schema: { type: integer } }
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema: { $ref: '#/components/schemas/CustomerRequest' }
   *     responses:
   *       200: { description: Customer updated successfully. }
   *       404: { description: Customer not found. }
   *       409: { description: A customer with this email already exists. }
   */
  router.put(
    "/:id",
    generalRateLimit,
    validateParams(customerIdParamSchema),
    validateBody(customerBodySchema),
    customerController.updateCustomer
  );

  /**
   * @openapi
   * /customers/{id}:
   *   delete:
   *     tags: [Customers]
   *     summary: Delete a customer and their user account
   *     parameters:
   *       - { in: path, name: id, required: true, schema: { type: integer } }
   *     responses:
   *       200: { description: Customer deleted successfully. }
   *       404: { description: Customer not found. }
   */
  router.delete("/:id", generalRateLimit, validateParams(customerIdParamSchema), customerController.deleteCustomer);

  return router;
};
