/** Tunable booking rules. Defaults can be overridden through the BOOKING_* environment variables. */
export interface BookingPolicy {
  timezone: string;
  currency: string;
  minSlotMinutes: number;
  rescheduleNoticeMinutes: number;
  maxAdvanceBookingDays: number;
  followUpWindowDays: number;
  fullRefundNoticeHours: number;
  lateCancellationRefundPercent: number;
  emergencyLeadMinutes: number;
}

export const DEFAULT_BOOKING_POLICY: BookingPolicy = {
  timezone: "UTC",
  currency: "INR",
  minSlotMinutes: 15,
  rescheduleNoticeMinutes: 120,
  maxAdvanceBookingDays: 90,
  followUpWindowDays: 30,
  fullRefundNoticeHours: 24,
  lateCancellationRefundPercent: 100,
  emergencyLeadMinutes: 15,
};
