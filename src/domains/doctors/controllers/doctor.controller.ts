import { Request, Response, NextFunction } from "express";
import { getActor } from "@/shared/middleware/auth.middleware";
import { endOfDay, parseDate } from "@/shared/utils/date";
import { sendOperationResult } from "@/domains/appointments/controllers/booking-response";
import type { BookingService } from "@/domains/appointments/services/booking.service";
import type { AvailabilitySlot } from "@/domains/appointments/types/booking.types";
import {
  availabilityQuerySchema,
  bookingStatsQuerySchema,
  doctorIdParamSchema,
  nextAvailableQuerySchema,
} from "../validators/doctor.validator";

const presentSlots = (slots: AvailabilitySlot[]) =>
  slots.map((slot) => ({
    start: slot.start.toISOString(),
    end: slot.end.toISOString(),
    fee: slot.fee,
    doctorId: slot.doctorId,
    clinicId: slot.clinicId,
  }));

export class DoctorController {
  constructor(private readonly bookingService: BookingService) {}

  getAvailability = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { id } = doctorIdParamSchema.parse(req.params);
      const query = availabilityQuerySchema.parse(req.query);
      const { timezone } = this.bookingService.bookingPolicy;

      const result = await this.bookingService.getDoctorAvailability({
        doctorId: id,
        type: query.type,
        clinicId: query.clinicId ?? null,
        startDate: parseDate(query.startDate, timezone),
        endDate: endOfDay(parseDate(query.endDate, timezone), timezone),
      });

      sendOperationResult(res, result, presentSlots);
    } catch (error) {
      next(error);
    }
  };

  getNextAvailableSlots = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { id } = doctorIdParamSchema.parse(req.params);
      const query = nextAvailableQuerySchema.parse(req.query);

      const result = await this.bookingService.getNextAvailableSlots(id, query.type, query.count, query.clinicId);

      sendOperationResult(res, result, presentSlots);
    } catch (error) {
      next(error);
    }
  };

  getBookingStats = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { id } = doctorIdParamSchema.parse(req.params);
      const query = bookingStatsQuerySchema.parse(req.query);

      const result = await this.bookingService.getBookingStats(id, getActor(req), query.days);

      sendOperationResult(res, result);
    } catch (error) {
      next(error);
    }
  };
}
