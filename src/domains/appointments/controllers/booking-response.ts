import { Response } from "express";
import { sendError, sendSuccess } from "@/shared/utils/response";
import { BookingError, BookingResult, OperationResult, bookingErrorStatus } from "../types/booking.types";

// Typed booking outcomes map onto the standard response envelope
export const sendBookingResult = (res: Response, result: BookingResult, successStatus: number = 200): void => {
  if (result.error !== BookingError.SUCCESS) {
    sendError(res, result.message, bookingErrorStatus(result.error), undefined, result.error);
    return;
  }

  sendSuccess(
    res,
    {
      appointment: result.appointment?.toJSON() ?? null,
      ...(result.paymentUrl && { paymentUrl: result.paymentUrl }),
    },
    result.message,
    successStatus
  );
};

export const sendOperationResult = <T>(
  res: Response,
  result: OperationResult<T>,
  present: (data: T) => unknown = (data) => data
): void => {
  if (result.error !== BookingError.SUCCESS) {
    sendError(res, result.message, bookingErrorStatus(result.error), undefined, result.error);
    return;
  }

  sendSuccess(res, present(result.data), result.message);
};
