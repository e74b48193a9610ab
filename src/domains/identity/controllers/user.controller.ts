import { Request, Response, NextFunction } from "express";
import { sendDeleted, sendOperationResult, sendSuccess } from "@/shared/utils/response";
import type { UserManagementService } from "../services/user-management.service";
import { userEmailParamSchema } from "../validators/user.validator";

export class UserController {
  constructor(private readonly userManagementService: UserManagementService) {}

  deleteUser = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { email } = userEmailParamSchema.parse(req.params);
      const result = await this.userManagementService.permanentlyDeleteUserByEmail(email);

      if (result.success) {
        return sendDeleted(res, result.message);
      }
      sendOperationResult(res, result);
    } catch (error) {
      next(error);
    }
  };

  userExists = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { email } = userEmailParamSchema.parse(req.params);
      const exists = await this.userManagementService.userExists(email);

      sendSuccess(res, { email, exists }, "User lookup completed");
    } catch (error) {
      next(error);
    }
  };
}
