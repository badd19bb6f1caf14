import { Router } from "express";
import type { Authenticator } from "@/shared/middleware/auth.middleware";
import type { RateLimiters } from "@/shared/middleware/rate-limit.middleware";
import { AppointmentController, createAppointmentRoutes, type BookingService } from "@/domains/appointments";
import { DoctorController, createDoctorRoutes } from "@/domains/doctors";

export interface ApiDependencies {
  bookingService: BookingService;
  auth: Authenticator;
  limiters: RateLimiters;
}

export const createApiRouter = ({ bookingService, auth, limiters }: ApiDependencies): Router => {
  const router = Router();

  // Mount domain routes
  router.use("/appointments", createAppointmentRoutes(new AppointmentController(bookingService), auth, limiters));
  router.use("/doctors", createDoctorRoutes(new DoctorController(bookingService), auth, limiters));

  return router;
};
