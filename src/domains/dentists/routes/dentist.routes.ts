import { Router } from "express";
import { validateBody, validateParams, validateQuery } from "@/shared/middleware/validation.middleware";
import { generalRateLimit, createResourceRateLimit } from "@/shared/middleware/rate-limit.middleware";
import type { DentistController } from "../controllers/dentist.controller";
import { dentistBodySchema, dentistIdParamSchema, queryDentistsSchema } from "../validators/dentist.validator";

export const createDentistRoutes = (dentistController: DentistController): Router => {
  const router = Router();

  /**
   * @openapi
   * /dentists:
   *   get:
   *     tags: [Dentists]
   *     summary: List dentists
   *     parameters:
   *       - { in: query, name: page, schema: { type: integer, default: 1 } }
   *       - { in: query, name: pageSize, schema: { type: integer, default: 10 } }
   *     responses:
   *       200: { description: Paginated dentists }
   */
  router.get("/", generalRateLimit, validateQuery(queryDentistsSchema), dentistController.getDentists);

  /**
   * @openapi
   * /dentists/{id}:
   *   get:
   *     tags: [Dentists]
   *     summary: Get a dentist
   *     parameters:
   *       - { in: path, name: id, required: true, schema: { type: integer } }
   *     responses:
   *       200: { description: The dentist }
   *       404: { description: Dentist not found }
   */
  router.get("/:id", generalRateLimit, validateParams(dentistIdParamSchema), dentistController.getDentist);

  /**
   * @openapi
   * /dentists:
   *   post:
   *     tags: [Dentists]
   *     summary: Register a dentist and announce it for user provisioning
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema: { $ref: '#/components/schemas/DentistRequest' }
   *     responses:
   *       201: { description: Dentist created }
   *       409: { description: Email already in use }
   */
  router.post("/", createResourceRateLimit, validateBody(dentistBodySchema), dentistController.createDentist);

  /**
   * @openapi
   * /dentists/{id}:
   *   put:
   *     tags: [Dentists]
   *     summary: Update a dentist
   *     parameters:
   *       - { in: path, name: id, required: true, schema: { type: integer } }
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema: { $ref: '#/components/schemas/DentistRequest' }
   *     responses:
   *       200: { description: Dentist updated }
   *       404: { description: Dentist not found }
   *       409: { description: Email already in use }
   */
  router.put(
    "/:id",
    generalRateLimit,
    validateParams(dentistIdParamSchema),
    validateBody(dentistBodySchema),
    dentistController.updateDentist
  );

  /**
   * @openapi
   * /dentists/{id}:
   *   delete:
   *     tags: [Dentists]
   *     summary: Delete a dentist
   *     parameters:
   *       - { in: path, name: id, required: true, schema: { type: integer } }
   *     responses:
   *       200: { description: Dentist deleted }
   *       404: { description: Dentist not found }
   */
  router.delete("/:id", generalRateLimit, validateParams(dentistIdParamSchema), dentistController.deleteDentist);

  return router;
};
