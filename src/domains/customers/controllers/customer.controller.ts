import { Request, Response, NextFunction } from "express";
import {
  sendDeleted,
  sendNotFound,
  sendOperationResult,
  sendPaginatedResponse,
  sendSuccess,
} from "@/shared/utils/response";
import type { CustomerService } from "../services/customer.service";
import { CustomerBody, customerIdParamSchema, queryCustomersSchema } from "../validators/customer.validator";

export class CustomerController {
  constructor(private readonly customerService: CustomerService) {}

  getCustomers = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { page, pageSize, search } = queryCustomersSchema.parse(req.query);
      const result = await this.customerService.getCustomers(page, pageSize, search);

      sendPaginatedResponse(res, result.customers, page, pageSize, result.total, "Customers retrieved successfully");
    } catch (error) {
      next(error);
    }
  };

  getCustomer = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { id } = customerIdParamSchema.parse(req.params);
      const customer = await this.customerService.getCustomerById(id);

      if (!customer) {
        return sendNotFound(res, `Customer with ID ${id} not found`);
      }

      sendSuccess(res, customer, "Customer retrieved successfully");
    } catch (error) {
      next(error);
    }
  };

  createCustomer = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const body: CustomerBody = req.body;
      const result = await this.customerService.createCustomerWithAuth(body);

      sendOperationResult(res, result, { successStatus: 201 });
    } catch (error) {
      next(error);
    }
  };

  updateCustomer = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { id } = customerIdParamSchema.parse(req.params);
      const body: CustomerBody = req.body;

      const result = await this.customerService.updateCustomer(id, body);

      sendOperationResult(res, result);
    } catch (error) {
      next(error);
    }
  };

  deleteCustomer = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { id } = customerIdParamSchema.parse(req.params);
      const result = await this.customerService.deleteCustomerWithAuth(id);

      if (result.success) {
        return sendDeleted(res, result.message);
      }
      sendOperationResult(res, result);
    } catch (error) {
      next(error);
    }
  };
}
