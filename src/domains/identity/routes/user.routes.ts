import { Router } from "express";
import { validateParams } from "@/shared/middleware/validation.middleware";
import { generalRateLimit } from "@/shared/middleware/rate-limit.middleware";
import type { UserController } from "../controllers/user.controller";
import { userEmailParamSchema } from "../validators/user.validator";

export const createUserRoutes = (userController: UserController): Router => {
  const router = Router();

  /**
   * @openapi
   * /users/{email}/exists:
   *   get:
   *     tags: [Users]
   *     summary: Whether the authentication service knows this email
   *     parameters:
   *       - { in: path, name: email, required: true, schema: { type: string, format: email } }
   *     responses:
   *       200: { description: Lookup result }
   */
  router.get("/:email/exists", generalRateLimit, validateParams(userEmailParamSchema), userController.userExists);

  /**
   * @openapi
   * /users/{email}:
   *   delete:
   *     tags: [Users]
   *     summary: Permanently delete a user from the clinic and the authentication service
   *     parameters:
   *       - { in: path, name: email, required: true, schema: { type: string, format: email } }
   *     responses:
   *       200: { description: User permanently deleted from all systems. }
   *       404: { description: User not found in the authentication system. }
   *       502: { description: Failed to delete user from authentication system. }
   */
  router.delete("/:email", generalRateLimit, validateParams(userEmailParamSchema), userController.deleteUser);

  return router;
};
