import { Request, Response, NextFunction } from "express";
import { sendCreated, sendDeleted, sendNotFound, sendPaginatedResponse, sendSuccess } from "@/shared/utils/response";
import type { DentistService } from "../services/dentist.service";
import { DentistBody, dentistIdParamSchema, queryDentistsSchema } from "../validators/dentist.validator";

export class DentistController {
  constructor(private readonly dentistService: DentistService) {}

  getDentists = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { page, pageSize } = queryDentistsSchema.parse(req.query);
      const result = await this.dentistService.getDentists(page, pageSize);

      sendPaginatedResponse(res, result.dentists, page, pageSize, result.total, "Dentists retrieved successfully");
    } catch (error) {
      next(error);
    }
  };

  getDentist = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { id } = dentistIdParamSchema.parse(req.params);
      const dentist = await this.dentistService.getDentistById(id);

      if (!dentist) {
        return sendNotFound(res, `Dentist with ID ${id} not found`);
      }

      sendSuccess(res, dentist, "Dentist retrieved successfully");
    } catch (error) {
      next(error);
    }
  };

  createDentist = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const body: DentistBody = req.body;
      const dentist = await this.dentistService.createDentistWithAuth(body);

      sendCreated(res, dentist, "Dentist created successfully");
    } catch (error) {
      next(error);
    }
  };

  updateDentist = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { id } = dentistIdParamSchema.parse(req.params);
      const body: DentistBody = req.body;

      const dentist = await this.dentistService.updateDentist(id, body);

      sendSuccess(res, dentist, "Dentist updated successfully");
    } catch (error) {
      next(error);
    }
  };

  deleteDentist = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { id } = dentistIdParamSchema.parse(req.params);

      if (!(await this.dentistService.deleteDentist(id))) {
        return sendNotFound(res, `Dentist with ID ${id} not found`);
      }

      sendDeleted(res, "Dentist deleted successfully");
    } catch (error) {
      next(error);
    }
  };
}
