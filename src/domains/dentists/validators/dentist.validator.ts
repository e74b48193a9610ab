import { z } from "zod";

export const dentistBodySchema = z.object({
  name: z.string().trim().min(1, "Name is required").max(100, "Name cannot exceed 100 characters"),
  email: z.string().trim().email("Invalid email format"),
  phone: z.string().max(20, "Phone cannot exceed 20 characters").default(""),
  licenseNumber: z.string().trim().min(1, "License number is required").max(50),
  specialization: z.string().max(100, "Specialization cannot exceed 100 characters").default(""),
  isActive: z.boolean().optional(),
});

export const dentistIdParamSchema = z.object({
  id: z.coerce.number({ invalid_type_error: "ID must be a number" }).int("ID must be an integer"),
});

export const queryDentistsSchema = z.object({
  page: z.coerce.number().int().min(1, "Page must be at least 1").default(1),
  pageSize: z.coerce.number().int().min(1).max(100, "Page size cannot exceed 100").default(10),
});

export type DentistBody = z.infer<typeof dentistBodySchema>;
