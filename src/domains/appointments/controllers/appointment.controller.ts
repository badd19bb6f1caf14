import { Request, Response, NextFunction } from "express";
import { getActor } from "@/shared/middleware/auth.middleware";
import { UserRole } from "@/shared/types/common.types";
import { parseDate } from "@/shared/utils/date";
import { sendError } from "@/shared/utils/response";
import type { AppointmentEntity } from "../models/appointment.model";
import type { BookingService } from "../services/booking.service";
import {
  BookAppointmentBody,
  CancelAppointmentBody,
  CompleteAppointmentBody,
  EmergencyBookingBody,
  FollowUpBody,
  RecordPaymentBody,
  RescheduleAppointmentBody,
  appointmentIdParamSchema,
  listAppointmentsQuerySchema,
} from "../validators/appointment.validator";
import { sendBookingResult, sendOperationResult } from "./booking-response";

const presentAppointments = (appointments: AppointmentEntity[]) => appointments.map((item) => item.toJSON());

export class AppointmentController {
  constructor(private readonly bookingService: BookingService) {}

  bookAppointment = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const actor = getActor(req);
      const body: BookAppointmentBody = req.body;

      // Patients always book for themselves
      const userId = actor.role === UserRole.PATIENT ? actor.id : body.userId;
      if (!userId) {
        return sendError(res, "userId is required when booking for a patient", 400, undefined, "VALIDATION_ERROR");
      }

      const result = await this.bookingService.bookAppointment(
        {
          userId,
          doctorId: body.doctorId,
          clinicId: body.clinicId ?? null,
          type: body.type,
          preferredStartTime: body.preferredStartTime,
          notes: body.notes ?? null,
        },
        actor
      );

      sendBookingResult(res, result, 201);
    } catch (error) {
      next(error);
    }
  };

  bookEmergencyAppointment = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const actor = getActor(req);
      const body: EmergencyBookingBody = req.body;

      const userId = actor.role === UserRole.PATIENT ? actor.id : body.userId;
      if (!userId) {
        return sendError(res, "userId is required when booking for a patient", 400, undefined, "VALIDATION_ERROR");
      }

      const result = await this.bookingService.bookEmergencyAppointment(
        {
          userId,
          city: body.city,
          type: body.type,
          ...(body.preferredStartTime && { preferredStartTime: body.preferredStartTime }),
          clinicId: body.clinicId ?? null,
          notes: body.notes ?? null,
        },
        actor
      );

      sendBookingResult(res, result, 201);
    } catch (error) {
      next(error);
    }
  };

  bookFollowUpAppointment = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { id } = appointmentIdParamSchema.parse(req.params);
      const body: FollowUpBody = req.body;

      const result = await this.bookingService.bookFollowUpAppointment(
        { parentAppointmentId: id, preferredStartTime: body.preferredStartTime, notes: body.notes ?? null },
        getActor(req)
      );

      sendBookingResult(res, result, 201);
    } catch (error) {
      next(error);
    }
  };

  /**
   * Patients get their own bookings. Doctors get one day of their schedule. Admins
   * pick either view with `userId` or `doctorId`.
   */
  getAppointments = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const actor = getActor(req);
      const query = listAppointmentsQuerySchema.parse(req.query);
      const { timezone } = this.bookingService.bookingPolicy;
      const day = query.date ? parseDate(query.date, timezone) : new Date();

      if (actor.role === UserRole.PATIENT) {
        const result = await this.bookingService.getUserAppointments(actor.id, actor, query.status);
        return sendOperationResult(res, result, presentAppointments);
      }

      if (actor.role === UserRole.DOCTOR) {
        const result = await this.bookingService.getDoctorAppointments(actor.id, day, actor);
        return sendOperationResult(res, result, presentAppointments);
      }

      if (query.userId) {
        const result = await this.bookingService.getUserAppointments(query.userId, actor, query.status);
        return sendOperationResult(res, result, presentAppointments);
      }

      if (query.doctorId) {
        const result = await this.bookingService.getDoctorAppointments(query.doctorId, day, actor);
        return sendOperationResult(res, result, presentAppointments);
      }

      sendError(res, "Either userId or doctorId is required", 400, undefined, "VALIDATION_ERROR");
    } catch (error) {
      next(error);
    }
  };

  getAppointment = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { id } = appointmentIdParamSchema.parse(req.params);
      const result = await this.bookingService.getAppointment(id, getActor(req));

      sendOperationResult(res, result, (appointment) => appointment.toJSON());
    } catch (error) {
      next(error);
    }
  };

  getQueuePosition = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { id } = appointmentIdParamSchema.parse(req.params);
      const result = await this.bookingService.getQueuePosition(id, getActor(req));

      sendOperationResult(res, result);
    } catch (error) {
      next(error);
    }
  };

  rescheduleAppointment = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { id } = appointmentIdParamSchema.parse(req.params);
      const body: RescheduleAppointmentBody = req.body;

      const result = await this.bookingService.rescheduleAppointment(
        { appointmentId: id, newStartTime: body.newStartTime },
        getActor(req)
      );

      sendBookingResult(res, result);
    } catch (error) {
      next(error);
    }
  };

  cancelAppointment = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { id } = appointmentIdParamSchema.parse(req.params);
      const body: CancelAppointmentBody = req.body;

      const result = await this.bookingService.cancelAppointment(
        { appointmentId: id, reason: body.reason, description: body.description ?? null },
        getActor(req)
      );

      sendBookingResult(res, result);
    } catch (error) {
      next(error);
    }
  };

  confirmAppointment = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { id } = appointmentIdParamSchema.parse(req.params);
      sendBookingResult(res, await this.bookingService.confirmAppointment(id, getActor(req)));
    } catch (error) {
      next(error);
    }
  };

  startAppointment = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { id } = appointmentIdParamSchema.parse(req.params);
      sendBookingResult(res, await this.bookingService.startAppointment(id, getActor(req)));
    } catch (error) {
      next(error);
    }
  };

  completeAppointment = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { id } = appointmentIdParamSchema.parse(req.params);
      const body: CompleteAppointmentBody = req.body;

      sendBookingResult(res, await this.bookingService.completeAppointment(id, getActor(req), body.notes));
    } catch (error) {
      next(error);
    }
  };

  markNoShow = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { id } = appointmentIdParamSchema.parse(req.params);
      sendBookingResult(res, await this.bookingService.markAppointmentNoShow(id, getActor(req)));
    } catch (error) {
      next(error);
    }
  };

  createPaymentOrder = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { id } = appointmentIdParamSchema.parse(req.params);
      sendBookingResult(res, await this.bookingService.createPaymentOrder(id, getActor(req)), 201);
    } catch (error) {
      next(error);
    }
  };

  recordPayment = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { id } = appointmentIdParamSchema.parse(req.params);
      const body: RecordPaymentBody = req.body;

      const result = await this.bookingService.recordPayment(
        id,
        { orderId: body.orderId, paymentId: body.paymentId, signature: body.signature, method: body.method },
        getActor(req)
      );

      sendBookingResult(res, result);
    } catch (error) {
      next(error);
    }
  };

  refundPayment = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { id } = appointmentIdParamSchema.parse(req.params);
      sendBookingResult(res, await this.bookingService.refundPayment(id, getActor(req)));
    } catch (error) {
      next(error);
    }
  };

  deleteAppointment = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { id } = appointmentIdParamSchema.parse(req.params);
      sendBookingResult(res, await this.bookingService.deleteAppointment(id, getActor(req)));
    } catch (error) {
      next(error);
    }
  };
}
