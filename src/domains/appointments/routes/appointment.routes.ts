import { Router } from "express";
import { validateBody, validateParams, validateQuery } from "@/shared/middleware/validation.middleware";
import { generalRateLimit, createResourceRateLimit } from "@/shared/middleware/rate-limit.middleware";
import type { AppointmentController } from "../controllers/appointment.controller";
import {
  createAppointmentSchema,
  updateAppointmentSchema,
  updateAppointmentStatusSchema,
  requestCancellationSchema,
  queryAppointmentsSchema,
  appointmentIdParamSchema,
  customerIdParamSchema,
  dentistIdParamSchema,
  availableSlotsSchema,
} from "../validators/appointment.validator";

export const createAppointmentRoutes = (appointmentController: AppointmentController): Router => {
  const router = Router();

  /**
   * @openapi
   * /appointments:
   *   get:
   *     tags: [Appointments]
   *     summary: List appointments
   *     parameters:
   *       - { in: query, name: customerId, schema: { type: integer } }
   *       - { in: query, name: dentistId, schema: { type: integer } }
   *       - { in: query, name: startDate, schema: { type: string, format: date-time } }
   *       - { in: query, name: endDate, schema: { type: string, format: date-time } }
   *       - { in: query, name: status, schema: { $ref: '#/components/schemas/AppointmentStatus' } }
   *       - { in: query, name: page, schema: { type: integer, default: 1 } }
   *       - { in: query, name: pageSize, schema: { type: integer, default: 10 } }
   *     responses:
   *       200: { description: Paginated appointments }
   */
  router.get(
    "/",
    generalRateLimit,
    validateQuery(queryAppointmentsSchema),
    appointmentController.getAppointments
  );

  /**
   * @openapi
   * /appointments/available-slots:
   *   get:
   *     tags: [Appointments]
   *     summary: Free 30-minute slots of every active dentist
   *     parameters:
   *       - { in: query, name: startDate, required: true, schema: { type: string, format: date-time } }
   *       - { in: query, name: endDate, required: true, schema: { type: string, format: date-time } }
   *     responses:
   *       200: { description: Available slots }
   *       400: { description: Start date must be before end date }
   */
  router.get(
    "/available-slots",
    generalRateLimit,
    validateQuery(availableSlotsSchema),
    appointmentController.getAllAvailableSlots
  );

  /**
   * @openapi
   * /appointments/customer/{customerId}:
   *   get:
   *     tags: [Appointments]
   *     summary: Appointments of a customer
   *     parameters:
   *       - { in: path, name: customerId, required: true, schema: { type: integer } }
   *     responses:
   *       200: { description: Appointments ordered by date/time }
   */
  router.get(
    "/customer/:customerId",
    generalRateLimit,
    validateParams(customerIdParamSchema),
    appointmentController.getCustomerAppointments
  );

  /**
   * @openapi
   * /appointments/dentist/{dentistId}:
   *   get:
   *     tags: [Appointments]
   *     summary: Appointments of a dentist
   *     parameters:
   *       - { in: path, name: dentistId, required: true, schema: { type: integer } }
   *     responses:
   *       200: { description: Appointments ordered by date/time }
   */
  router.get(
    "/dentist/:dentistId",
    generalRateLimit,
    validateParams(dentistIdParamSchema),
    appointmentController.getDentistAppointments
  );

  /**
   * @openapi
   * /appointments/dentist/{dentistId}/available-slots:
   *   get:
   *     tags: [Appointments]
   *     summary: Free 30-minute slots of one dentist
   *     parameters:
   *       - { in: path, name: dentistId, required: true, schema: { type: integer } }
   *       - { in: query, name: startDate, required: true, schema: { type: string, format: date-time } }
   *       - { in: query, name: endDate, required: true, schema: { type: string, format: date-time } }
   *     responses:
   *       200: { description: Available slots }
   *       400: { description: Start date must be before end date }
   *       404: { description: Dentist not found }
   */
  router.get(
    "/dentist/:dentistId/available-slots",
    generalRateLimit,
    validateParams(dentistIdParamSchema),
    validateQuery(availableSlotsSchema),
    appointmentController.getAvailableSlots
  );

  /**
   * @openapi
   * /appointments/{id}:
   *   get:
   *     tags: [Appointments]
   *     summary: Get an appointment
   *     parameters:
   *       - { in: path, name: id, required: true, schema: { type: integer } }
   *     responses:
   *       200: { description: The appointment }
   *       404: { description: Appointment not found }
   */
  router.get(
    "/:id",
    generalRateLimit,
    validateParams(appointmentIdParamSchema),
    appointmentController.getAppointment
  );

  /**
   * @openapi
   * /appointments:
   *   post:
   *     tags: [Appointments]
   *     summary: Book an appointment
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema: { $ref: '#/components/schemas/AppointmentRequest' }
   *     responses:
   *       201: { description: Appointment created successfully. }
   *       400: { description: Invalid input or date/time outside business rules }
   *       409: { description: Customer or dentist already booked at this time }
   *       422: { description: Customer or dentist missing or inactive }
   */
  router.post(
    "/",
    createResourceRateLimit,
    validateBody(createAppointmentSchema),
    appointmentController.createAppointment
  );

  /**
   * @openapi
   * /appointments/{id}:
   *   put:
   *     tags: [Appointments]
   *     summary: Update an appointment
   *     parameters:
   *       - { in: path, name: id, required: true, schema: { type: integer } }
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema: { $ref: '#/components/schemas/AppointmentRequest' }
   *     responses:
   *       200: { description: Appointment updated successfully. }
   *       404: { description: Appointment not found. }
   *       409: { description: Slot already taken }
   */
  router.put(
    "/:id",
    generalRateLimit,
    validateParams(appointmentIdParamSchema),
    validateBody(updateAppointmentSchema),
    appointmentController.updateAppointment
  );

  /**
   * @openapi
   * /appointments/{id}/status:
   *   put:
   *     tags: [Appointments]
   *     summary: Overwrite the status of an appointment
   *     parameters:
   *       - { in: path, name: id, required: true, schema: { type: integer } }
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required: [status]
   *             properties:
   *               status: { $ref: '#/components/schemas/AppointmentStatus' }
   *               reason: { type: string }
   *     responses:
   *       200: { description: Status updated }
   *       404: { description: Appointment not found }
   */
  router.put(
    "/:id/status",
    generalRateLimit,
    validateParams(appointmentIdParamSchema),
    validateBody(updateAppointmentStatusSchema),
    appointmentController.updateAppointmentStatus
  );

  /**
   * @openapi
   * /appointments/{id}/request-cancellation:
   *   post:
   *     tags: [Appointments]
   *     summary: Customer asks for a scheduled appointment to be cancelled
   *     parameters:
   *       - { in: path, name: id, required: true, schema: { type: integer } }
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required: [customerId]
   *             properties:
   *               customerId: { type: integer }
   *     responses:
   *       200: { description: Cancellation request submitted successfully. }
   *       422: { description: Not the owner, or appointment not scheduled }
   */
  router.post(
    "/:id/request-cancellation",
    generalRateLimit,
    validateParams(appointmentIdParamSchema),
    validateBody(requestCancellationSchema),
    appointmentController.requestCancellation
  );

  /**
   * @openapi
   * /appointments/{id}/cancel:
   *   post:
   *     tags: [Appointments]
   *     summary: Cancel an appointment
   *     parameters:
   *       - { in: path, name: id, required: true, schema: { type: integer } }
   *     responses:
   *       200: { description: Appointment cancelled successfully. }
   *       422: { description: Cannot cancel completed appointments. }
   */
  router.post(
    "/:id/cancel",
    generalRateLimit,
    validateParams(appointmentIdParamSchema),
    appointmentController.cancelAppointment
  );

  /**
   * @openapi
   * /appointments/{id}/complete:
   *   post:
   *     tags: [Appointments]
   *     summary: Mark an appointment as completed
   *     parameters:
   *       - { in: path, name: id, required: true, schema: { type: integer } }
   *     responses:
   *       200: { description: Appointment marked as completed. }
   *       422: { description: Only scheduled appointments can be completed. }
   */
  router.post(
    "/:id/complete",
    generalRateLimit,
    validateParams(appointmentIdParamSchema),
    appointmentController.completeAppointment
  );

  /**
   * @openapi
   * /appointments/{id}:
   *   delete:
   *     tags: [Appointments]
   *     summary: Delete an appointment
   *     parameters:
   *       - { in: path, name: id, required: true, schema: { type: integer } }
   *     responses:
   *       200: { description: Appointment deleted }
   *       404: { description: Appointment not found }
   */
  router.delete(
    "/:id",
    generalRateLimit,
    validateParams(appointmentIdParamSchema),
    appointmentController.deleteAppointment
  );

  return router;
};
