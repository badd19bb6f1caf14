import type { DateTimeSlot } from "@/shared/types/common.types";
import { addMinutes, getDateRange } from "@/shared/utils/date";
import type { ConsultationType, DoctorEntity } from "@/domains/doctors/models/doctor.model";
import type { ClinicEntity } from "@/domains/clinics/models/clinic.model";
import type { AvailabilitySlot } from "../types/booking.types";

export interface SlotGenerationInput {
  doctor: DoctorEntity;
  clinic: ClinicEntity | null;
  type: ConsultationType;
  from: Date;
  to: Date;
  /** Intervals already taken by live appointments. */
  booked: DateTimeSlot[];
  now: Date;
  /** Zone of the doctor's weekly pattern when no clinic is involved. */
  timezone: string;
}

/** Pairwise intersection of two sorted interval lists. */
export const intersectIntervals = (left: DateTimeSlot[], right: DateTimeSlot[]): DateTimeSlot[] => {
  const result: DateTimeSlot[] = [];

  for (const a of left) {
    for (const b of right) {
      const start = a.start > b.start ? a.start : b.start;
      const end = a.end < b.end ? a.end : b.end;
      if (start < end) {
        result.push({ start, end });
      }
    }
  }

  return result.sort((x, y) => x.start.getTime() - y.start.getTime());
};

/** Removes every booked interval from the windows (half-open, so touching intervals stay intact). */
export const subtractIntervals = (windows: DateTimeSlot[], booked: DateTimeSlot[]): DateTimeSlot[] => {
  const taken = [...booked].sort((x, y) => x.start.getTime() - y.start.getTime());
  const result: DateTimeSlot[] = [];

  for (const window of windows) {
    let cursor = window.start;

    for (const busy of taken) {
      if (busy.end <= cursor || busy.start >= window.end) continue;

      if (busy.start > cursor) {
        result.push({ start: cursor, end: busy.start });
      }
      if (busy.end > cursor) {
        cursor = busy.end;
      }
    }

    if (cursor < window.end) {
      result.push({ start: cursor, end: window.end });
    }
  }

  return result;
};

/**
 * Lazily yields bookable slots in ascending order: the doctor's weekly windows,
 * narrowed to the clinic's opening hours for in-person visits, minus booked
 * intervals, cut into consultation-length pieces that start no earlier than now.
 */
export function* generateAvailabilitySlots(input: SlotGenerationInput): Generator<AvailabilitySlot> {
  const { doctor, clinic, type, from, to, booked, now } = input;
  const timezone = clinic?.timezone ?? input.timezone;
  const duration = doctor.consultationDurationMinutes;
  const earliest = from > now ? from : now;

  if (duration <= 0 || earliest >= to) {
    return;
  }

  for (const day of getDateRange(earliest, to, timezone)) {
    let windows = doctor.windowsOn(day, timezone, type, clinic?.id);

    if (clinic) {
      windows = intersectIntervals(windows, clinic.openWindowsOn(day));
    }

    for (const free of subtractIntervals(windows, booked)) {
      for (let start = free.start; addMinutes(start, duration) <= free.end; start = addMinutes(start, duration)) {
        const end = addMinutes(start, duration);

        if (start < earliest) continue;
        if (end > to) return;

        yield {
          start,
          end,
          fee: doctor.consultationFee,
          doctorId: doctor.id,
          clinicId: clinic?.id ?? null,
        };
      }
    }
  }
}

export const takeSlots = (slots: Iterable<AvailabilitySlot>, count: number): AvailabilitySlot[] => {
  const taken: AvailabilitySlot[] = [];
  if (count <= 0) return taken;

  for (const slot of slots) {
    taken.push(slot);
    if (taken.length >= count) break;
  }

  return taken;
};
