import { z } from "zod";

// Blank name/email/phone pass through so the service can answer with its own message
const optionalEmailSchema = z.union([z.literal(""), z.string().trim().email("Invalid email format")]);

export const customerBodySchema = z.object({
  name: z.string().max(100, "Name cannot exceed 100 characters").default(""),
  email: optionalEmailSchema.default(""),
  phone: z.string().max(20, "Phone cannot exceed 20 characters").default(""),
  dateOfBirth: z.coerce.date({ errorMap: () => ({ message: "Invalid date of birth" }) }).nullable().optional(),
  address: z.string().max(200, "Address cannot exceed 200 characters").optional(),
  isActive: z.boolean().optional(),
});

export const customerIdParamSchema = z.object({
  id: z.coerce.number({ invalid_type_error: "ID must be a number" }).int("ID must be an integer"),
});

export const queryCustomersSchema = z.object({
  page: z.coerce.number().int().min(1, "Page must be at least 1").default(1),
  pageSize: z.coerce.number().int().min(1).max(100, "Page size cannot exceed 100").default(10),
  search: z.string().trim().max(100).optional(),
});

export type CustomerBody = z.infer<typeof customerBodySchema>;
export type QueryCustomers = z.infer<typeof queryCustomersSchema>;
