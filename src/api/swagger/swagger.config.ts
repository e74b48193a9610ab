import path from "path";
import swaggerJsdoc from "swagger-jsdoc";
import { config } from "@/shared/config/environment";

const swaggerDefinition = {
  openapi: "3.0.0",
  info: {
    title: config.app.name,
    version: "1.0.0",
    description: "Dental clinic API: customers, dentists and appointment scheduling",
  },
  servers: [
    {
      url: `/api/${config.app.apiVersion}`,
      description: config.app.isDevelopment ? "Development server" : "Current server",
    },
  ],
  components: {
    schemas: {
      ApiResponse: {
        type: "object",
        properties: {
          success: {
            type: "boolean",
            description: "Indicates if the request was successful",
          },
          data: {
            type: "object",
            description: "Response data (if any)",
          },
          message: {
            type: "string",
            description: "Human-readable message",
          },
          code: {
            type: "string",
            description: "Machine-readable error code (failures only)",
          },
          errors: {
            type: "array",
            items: {
              $ref: "#/components/schemas/ValidationError",
            },
            description: "Validation errors (if any)",
          },
          meta: {
            $ref: "#/components/schemas/PaginationMeta",
          },
        },
        required: ["success"],
      },
      ValidationError: {
        type: "object",
        properties: {
          field: { type: "string", description: "Field that failed validation" },
          message: { type: "string", description: "Validation error message" },
          code: { type: "string", description: "Error code" },
        },
        required: ["field", "message"],
      },
      PaginationMeta: {
        type: "object",
        properties: {
          page: { type: "integer" },
          limit: { type: "integer" },
          total: { type: "integer" },
          totalPages: { type: "integer" },
          hasNextPage: { type: "boolean" },
          hasPreviousPage: { type: "boolean" },
        },
        required: ["page", "limit", "total", "totalPages", "hasNextPage", "hasPreviousPage"],
      },
      AppointmentStatus: {
        type: "string",
        enum: ["Scheduled", "Completed", "Cancelled", "CancellationRequested"],
      },
      AppointmentRequest: {
        type: "object",
        properties: {
          customerId: { type: "integer", example: 1 },
          dentistId: { type: "integer", example: 1 },
          appointmentDateTime: {
            type: "string",
            format: "date-time",
            description: "Weekday slot between 08:00 and 18:00 in the clinic timezone",
            example: "2030-03-04T10:30:00Z",
          },
          procedureType: { type: "string", example: "Cleaning" },
          notes: { type: "string" },
        },
        required: ["customerId", "dentistId", "appointmentDateTime", "procedureType"],
      },
      CustomerRequest: {
        type: "object",
        properties: {
          name: { type: "string", example: "Jane Doe" },
          email: { type: "string", format: "email" },
          phone: { type: "string" },
          dateOfBirth: { type: "string", format: "date", nullable: true },
          address: { type: "string" },
          isActive: { type: "boolean" },
        },
        required: ["name", "email", "phone"],
      },
      DentistRequest: {
        type: "object",
        properties: {
          name: { type: "string", example: "Alex Smith" },
          email: { type: "string", format: "email" },
          phone: { type: "string" },
          licenseNumber: { type: "string", example: "DDS-1001" },
          specialization: { type: "string", example: "Orthodontics" },
          isActive: { type: "boolean" },
        },
        required: ["name", "email", "licenseNumber"],
      },
    },
  },
  tags: [
    { name: "Appointments", description: "Scheduling, availability and appointment lifecycle" },
    { name: "Customers", description: "Customer records and account provisioning" },
    { name: "Dentists", description: "Dentist records" },
    { name: "Users", description: "Authentication-service users" },
  ],
};

const options = {
  definition: swaggerDefinition,
  apis: [path.join(__dirname, "../../domains/**/routes/*.{ts,js}")],
};

export const createSwaggerSpec = (): object => {
  return swaggerJsdoc(options);
};
