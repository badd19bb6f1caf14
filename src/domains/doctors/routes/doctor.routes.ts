import { Router } from "express";
import type { Authenticator } from "@/shared/middleware/auth.middleware";
import { validateParams, validateQuery } from "@/shared/middleware/validation.middleware";
import type { RateLimiters } from "@/shared/middleware/rate-limit.middleware";
import { UserRole } from "@/shared/types/common.types";
import type { DoctorController } from "../controllers/doctor.controller";
import {
  availabilityQuerySchema,
  bookingStatsQuerySchema,
  doctorIdParamSchema,
  nextAvailableQuerySchema,
} from "../validators/doctor.validator";

/**
 * @swagger
 * tags:
 *   name: Doctors
 *   description: Doctor availability and booking statistics
 */
export const createDoctorRoutes = (controller: DoctorController, auth: Authenticator, limiters: RateLimiters): Router => {
  const router = Router();

  router.use(auth.authenticateToken);

  /**
   * @swagger
   * /doctors/{id}/availability:
   *   get:
   *     summary: Bookable slots of a doctor between two dates
   *     tags: [Doctors]
   *     security:
   *       - bearerAuth: []
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: string
   *           format: uuid
   *       - in: query
   *         name: startDate
   *         required: true
   *         schema:
   *           type: string
   *           format: date
   *       - in: query
   *         name: endDate
   *         required: true
   *         schema:
   *           type: string
   *           format: date
   *       - in: query
   *         name: type
   *         schema:
   *           type: string
   *           enum: [online, offline]
   *       - in: query
   *         name: clinicId
   *         schema:
   *           type: string
   *           format: uuid
   *     responses:
   *       200:
   *         description: Slots in ascending start order
   *         content:
   *           application/json:
   *             schema:
   *               type: array
   *               items:
   *                 $ref: '#/components/schemas/AvailabilitySlot'
   */
  router.get(
    "/:id/availability",
    limiters.general,
    validateParams(doctorIdParamSchema),
    validateQuery(availabilityQuerySchema),
    controller.getAvailability
  );

  router.get(
    "/:id/next-available",
    limiters.general,
    validateParams(doctorIdParamSchema),
    validateQuery(nextAvailableQuerySchema),
    controller.getNextAvailableSlots
  );

  // Booking statistics (the doctor themselves or an admin)
  router.get(
    "/:id/stats",
    limiters.general,
    validateParams(doctorIdParamSchema),
    validateQuery(bookingStatsQuerySchema),
    auth.requireRole(UserRole.DOCTOR, UserRole.ADMIN),
    controller.getBookingStats
  );

  return router;
};
