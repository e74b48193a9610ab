import { Request, Response, NextFunction } from "express";
import {
  sendSuccess,
  sendNotFound,
  sendOperationResult,
  sendPaginatedResponse,
  sendDeleted,
} from "@/shared/utils/response";
import { AvailableSlot, toAppointmentResponse } from "../models/appointment.model";
import type { AppointmentService } from "../services/appointment.service";
import {
  AppointmentBody,
  appointmentIdParamSchema,
  availableSlotsSchema,
  customerIdParamSchema,
  dentistIdParamSchema,
  queryAppointmentsSchema,
  RequestCancellationBody,
  UpdateAppointmentStatusBody,
} from "../validators/appointment.validator";

const toSlotResponse = (slot: AvailableSlot) => ({
  ...slot,
  dateTime: slot.dateTime.toISOString(),
});

export class AppointmentController {
  constructor(private readonly appointmentService: AppointmentService) {}

  getAppointments = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const filters = queryAppointmentsSchema.parse(req.query);
      const result = await this.appointmentService.getAppointments(filters);

      sendPaginatedResponse(
        res,
        result.appointments.map(toAppointmentResponse),
        filters.page,
        filters.pageSize,
        result.total,
        "Appointments retrieved successfully"
      );
    } catch (error) {
      next(error);
    }
  };

  getAppointment = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { id } = appointmentIdParamSchema.parse(req.params);
      const appointment = await this.appointmentService.getAppointmentById(id);

      if (!appointment) {
        return sendNotFound(res, `Appointment with ID ${id} not found`);
      }

      sendSuccess(res, toAppointmentResponse(appointment), "Appointment retrieved successfully");
    } catch (error) {
      next(error);
    }
  };

  getCustomerAppointments = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { customerId } = customerIdParamSchema.parse(req.params);
      const appointments = await this.appointmentService.getAppointmentsByCustomer(customerId);

      sendSuccess(res, appointments.map(toAppointmentResponse), "Appointments retrieved successfully");
    } catch (error) {
      next(error);
    }
  };

  getDentistAppointments = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { dentistId } = dentistIdParamSchema.parse(req.params);
      const appointments = await this.appointmentService.getAppointmentsByDentist(dentistId);

      sendSuccess(res, appointments.map(toAppointmentResponse), "Appointments retrieved successfully");
    } catch (error) {
      next(error);
    }
  };

  getAvailableSlots = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { dentistId } = dentistIdParamSchema.parse(req.params);
      const { startDate, endDate } = availableSlotsSchema.parse(req.query);

      const result = await this.appointmentService.getAvailableSlots(dentistId, startDate, endDate);

      sendOperationResult(res, result, { transform: (slots) => slots.map(toSlotResponse) });
    } catch (error) {
      next(error);
    }
  };

  getAllAvailableSlots = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { startDate, endDate } = availableSlotsSchema.parse(req.query);
      const slots = await this.appointmentService.getAllAvailableSlots(startDate, endDate);

      sendSuccess(res, slots.map(toSlotResponse), "Available slots retrieved successfully");
    } catch (error) {
      next(error);
    }
  };

  createAppointment = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const body: AppointmentBody = req.body;
      const result = await this.appointmentService.createAppointment(body);

      sendOperationResult(res, result, { successStatus: 201, transform: toAppointmentResponse });
    } catch (error) {
      next(error);
    }
  };

  updateAppointment = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { id } = appointmentIdParamSchema.parse(req.params);
      const body: AppointmentBody = req.body;

      const result = await this.appointmentService.updateAppointment(id, body);

      sendOperationResult(res, result, { transform: toAppointmentResponse });
    } catch (error) {
      next(error);
    }
  };

  updateAppointmentStatus = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { id } = appointmentIdParamSchema.parse(req.params);
      const { status, reason }: UpdateAppointmentStatusBody = req.body;

      const appointment = await this.appointmentService.updateAppointmentStatus(id, status, reason);

      if (!appointment) {
        return sendNotFound(res, `Appointment with ID ${id} not found`);
      }

      sendSuccess(res, toAppointmentResponse(appointment), "Appointment status updated successfully");
    } catch (error) {
      next(error);
    }
  };

  requestCancellation = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { id } = appointmentIdParamSchema.parse(req.params);
      const { customerId }: RequestCancellationBody = req.body;

      const result = await this.appointmentService.requestAppointmentCancellation(id, customerId);

      sendOperationResult(res, result, { transform: toAppointmentResponse });
    } catch (error) {
      next(error);
    }
  };

  cancelAppointment = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { id } = appointmentIdParamSchema.parse(req.params);
      const result = await this.appointmentService.cancelAppointment(id);

      sendOperationResult(res, result, { transform: toAppointmentResponse });
    } catch (error) {
      next(error);
    }
  };

  completeAppointment = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { id } = appointmentIdParamSchema.parse(req.params);
      const result = await this.appointmentService.completeAppointment(id);

      sendOperationResult(res, result, { transform: toAppointmentResponse });
    } catch (error) {
      next(error);
    }
  };

  deleteAppointment = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { id } = appointmentIdParamSchema.parse(req.params);
      const deleted = await this.appointmentService.deleteAppointment(id);

      if (!deleted) {
        return sendNotFound(res, `Appointment with ID ${id} not found`);
      }

      sendDeleted(res, "Appointment deleted successfully");
    } catch (error) {
      next(error);
    }
  };
}
