import { Router } from "express";
import type { Authenticator } from "@/shared/middleware/auth.middleware";
import { validateBody, validateParams, validateQuery } from "@/shared/middleware/validation.middleware";
import type { RateLimiters } from "@/shared/middleware/rate-limit.middleware";
import { UserRole } from "@/shared/types/common.types";
import type { AppointmentController } from "../controllers/appointment.controller";
import {
  appointmentIdParamSchema,
  bookAppointmentSchema,
  cancelAppointmentSchema,
  completeAppointmentSchema,
  emergencyBookingSchema,
  followUpSchema,
  listAppointmentsQuerySchema,
  recordPaymentSchema,
  rescheduleAppointmentSchema,
} from "../validators/appointment.validator";

/**
 * @swagger
 * tags:
 *   name: Appointments
 *   description: Booking, lifecycle and payment of appointments
 */
export const createAppointmentRoutes = (
  controller: AppointmentController,
  auth: Authenticator,
  limiters: RateLimiters
): Router => {
  const router = Router();

  // Apply authentication to all routes
  router.use(auth.authenticateToken);

  /**
   * @swagger
   * /appointments:
   *   post:
   *     summary: Book an appointment
   *     tags: [Appointments]
   *     security:
   *       - bearerAuth: []
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             $ref: '#/components/schemas/BookAppointmentRequest'
   *     responses:
   *       201:
   *         description: Appointment booked
   *       409:
   *         description: The time slot is already taken
   *       422:
   *         description: The doctor, clinic or time cannot take the booking
   */
  router.post("/", limiters.booking, validateBody(bookAppointmentSchema), controller.bookAppointment);

  // Emergency booking with the first available doctor in a city
  router.post(
    "/emergency",
    limiters.booking,
    validateBody(emergencyBookingSchema),
    controller.bookEmergencyAppointment
  );

  /**
   * @swagger
   * /appointments:
   *   get:
   *     summary: List the caller's appointments
   *     description: Patients see their own bookings, doctors one day of their schedule.
   *     tags: [Appointments]
   *     security:
   *       - bearerAuth: []
   *     parameters:
   *       - in: query
   *         name: status
   *         schema:
   *           type: string
   *       - in: query
   *         name: date
   *         schema:
   *           type: string
   *           format: date
   *     responses:
   *       200:
   *         description: Appointments
   */
  router.get("/", limiters.general, validateQuery(listAppointmentsQuerySchema), controller.getAppointments);

  router.get("/:id", limiters.general, validateParams(appointmentIdParamSchema), controller.getAppointment);

  router.get("/:id/queue", limiters.general, validateParams(appointmentIdParamSchema), controller.getQueuePosition);

  router.post(
    "/:id/follow-up",
    limiters.booking,
    validateParams(appointmentIdParamSchema),
    validateBody(followUpSchema),
    controller.bookFollowUpAppointment
  );

  /**
   * @swagger
   * /appointments/{id}/reschedule:
   *   put:
   *     summary: Move an appointment to a new start time
   *     tags: [Appointments]
   *     security:
   *       - bearerAuth: []
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: string
   *           format: uuid
   *     responses:
   *       200:
   *         description: Appointment rescheduled
   *       409:
   *         description: The new slot is taken or the appointment changed concurrently
   */
  router.put(
    "/:id/reschedule",
    limiters.booking,
    validateParams(appointmentIdParamSchema),
    validateBody(rescheduleAppointmentSchema),
    controller.rescheduleAppointment
  );

  router.post(
    "/:id/cancel",
    limiters.general,
    validateParams(appointmentIdParamSchema),
    validateBody(cancelAppointmentSchema),
    controller.cancelAppointment
  );

  router.post(
    "/:id/confirm",
    limiters.general,
    validateParams(appointmentIdParamSchema),
    controller.confirmAppointment
  );

  // Consultation lifecycle (doctor only)
  router.post(
    "/:id/start",
    limiters.general,
    validateParams(appointmentIdParamSchema),
    auth.requireRole(UserRole.DOCTOR, UserRole.ADMIN),
    controller.startAppointment
  );

  router.post(
    "/:id/complete",
    limiters.general,
    validateParams(appointmentIdParamSchema),
    validateBody(completeAppointmentSchema),
    auth.requireRole(UserRole.DOCTOR, UserRole.ADMIN),
    controller.completeAppointment
  );

  router.post(
    "/:id/no-show",
    limiters.general,
    validateParams(appointmentIdParamSchema),
    auth.requireRole(UserRole.DOCTOR, UserRole.ADMIN),
    controller.markNoShow
  );

  // Payments
  router.post(
    "/:id/payment-order",
    limiters.booking,
    validateParams(appointmentIdParamSchema),
    controller.createPaymentOrder
  );

  router.post(
    "/:id/payment",
    limiters.general,
    validateParams(appointmentIdParamSchema),
    validateBody(recordPaymentSchema),
    controller.recordPayment
  );

  router.post(
    "/:id/refund",
    limiters.general,
    validateParams(appointmentIdParamSchema),
    auth.requireRole(UserRole.ADMIN),
    controller.refundPayment
  );

  router.delete(
    "/:id",
    limiters.general,
    validateParams(appointmentIdParamSchema),
    auth.requireRole(UserRole.ADMIN),
    controller.deleteAppointment
  );

  return router;
};
