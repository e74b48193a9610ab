import { z } from "zod";
import { AppointmentStatus } from "../models/appointment.model";

// Id rules (positive, existing) are checked by the service so its messages reach the client
const idSchema = z.coerce.number({ invalid_type_error: "ID must be a number" }).int("ID must be an integer");

const positiveIdSchema = idSchema.refine((id) => id > 0, "ID must be a positive integer");

const dateTimeSchema = z.coerce.date({
  errorMap: () => ({ message: "Invalid date/time" }),
});

const appointmentBodySchema = z.object({
  customerId: idSchema,
  dentistId: idSchema,
  appointmentDateTime: dateTimeSchema,
  procedureType: z.string().max(100, "Procedure type cannot exceed 100 characters"),
  notes: z.string().max(1000, "Notes cannot exceed 1000 characters").default(""),
});

export const createAppointmentSchema = appointmentBodySchema;

export const updateAppointmentSchema = appointmentBodySchema;

export const updateAppointmentStatusSchema = z.object({
  status: z.nativeEnum(AppointmentStatus, {
    errorMap: () => ({ message: `Status must be one of: ${Object.values(AppointmentStatus).join(", ")}` }),
  }),
  reason: z.string().max(500, "Reason cannot exceed 500 characters").default(""),
});

export const requestCancellationSchema = z.object({
  customerId: positiveIdSchema,
});

export const appointmentIdParamSchema = z.object({
  id: idSchema,
});

export const customerIdParamSchema = z.object({
  customerId: positiveIdSchema,
});

export const dentistIdParamSchema = z.object({
  dentistId: positiveIdSchema,
});

export const queryAppointmentsSchema = z
  .object({
    customerId: positiveIdSchema.optional(),
    dentistId: positiveIdSchema.optional(),
    startDate: dateTimeSchema.optional(),
    endDate: dateTimeSchema.optional(),
    status: z.nativeEnum(AppointmentStatus).optional(),
    page: z.coerce.number().int().min(1, "Page must be at least 1").default(1),
    pageSize: z.coerce.number().int().min(1).max(100, "Page size cannot exceed 100").default(10),
  })
  .refine((data) => !data.startDate || !data.endDate || data.startDate <= data.endDate, {
    message: "Start date must be before end date",
    path: ["endDate"],
  });

export const MAX_SLOT_SEARCH_DAYS = 31;

const DAY_MS = 24 * 60 * 60 * 1000;

export const availableSlotsSchema = z
  .object({
    startDate: dateTimeSchema,
    endDate: dateTimeSchema,
  })
  .refine((data) => data.startDate < data.endDate, {
    message: "Start date must be before end date",
    path: ["endDate"],
  })
  .refine((data) => data.endDate.getTime() - data.startDate.getTime() <= MAX_SLOT_SEARCH_DAYS * DAY_MS, {
    message: `Date range cannot exceed ${MAX_SLOT_SEARCH_DAYS} days`,
    path: ["endDate"],
  });

export type AppointmentBody = z.infer<typeof appointmentBodySchema>;
export type UpdateAppointmentStatusBody = z.infer<typeof updateAppointmentStatusSchema>;
export type RequestCancellationBody = z.infer<typeof requestCancellationSchema>;
export type QueryAppointments = z.infer<typeof queryAppointmentsSchema>;
export type AvailableSlotsQuery = z.infer<typeof availableSlotsSchema>;
