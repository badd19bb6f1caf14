import moment from "moment-timezone";
import { DateTimeSlot, DayOfWeek, TimeSlot } from "@/shared/types/common.types";

const DEFAULT_TIMEZONE = "UTC";

const MS_PER_MINUTE = 60_000;

// Date formatting utilities
export const formatDate = (date: Date, format: string = "YYYY-MM-DD", timezone: string = DEFAULT_TIMEZONE): string => {
  return moment(date).tz(timezone).format(format);
};

// Date parsing utilities

/** Parses a calendar date (YYYY-MM-DD) as local midnight in the given timezone. */
export const parseDate = (dateString: string, timezone: string = DEFAULT_TIMEZONE): Date => {
  return moment.tz(dateString, "YYYY-MM-DD", true, timezone).toDate();
};

// Time utilities
export const parseTimeString = (timeString: string): { hours: number; minutes: number } => {
  const [hours = 0, minutes = 0] = timeString.split(":").map(Number);
  return { hours, minutes };
};

export const timeStringToMinutes = (timeString: string): number => {
  const { hours, minutes } = parseTimeString(timeString);
  return hours * 60 + minutes;
};

export const isValidTimeString = (timeString: string): boolean => {
  const timeRegex = /^([01]?[0-9]|2[0-3]):[0-5][0-9]$/;
  return timeRegex.test(timeString);
};

// Instant arithmetic
export const addMinutes = (date: Date, minutes: number): Date => {
  return new Date(date.getTime() + minutes * MS_PER_MINUTE);
};

export const addDays = (date: Date, days: number): Date => {
  return moment(date).add(days, "days").toDate();
};

export const minutesBetween = (from: Date, to: Date): number => {
  return (to.getTime() - from.getTime()) / MS_PER_MINUTE;
};

/** Rounds up to the next multiple of `step` minutes (UTC-aligned). Exact multiples are kept. */
export const roundUpToMinutes = (date: Date, step: number): Date => {
  const stepMs = step * MS_PER_MINUTE;
  return new Date(Math.ceil(date.getTime() / stepMs) * stepMs);
};

// Day of week utilities
export const getDayOfWeek = (date: Date, timezone: string = DEFAULT_TIMEZONE): DayOfWeek => {
  return moment(date).tz(timezone).day();
};

export const startOfDay = (date: Date, timezone: string = DEFAULT_TIMEZONE): Date => {
  return moment(date).tz(timezone).startOf("day").toDate();
};

export const endOfDay = (date: Date, timezone: string = DEFAULT_TIMEZONE): Date => {
  return moment(date).tz(timezone).add(1, "day").startOf("day").toDate();
};

/** The instant at `time` (HH:mm) on the local calendar day of `day`. */
export const atTimeOfDay = (day: Date, time: string, timezone: string = DEFAULT_TIMEZONE): Date => {
  const { hours, minutes } = parseTimeString(time);
  return moment(day).tz(timezone).startOf("day").hour(hours).minute(minutes).toDate();
};

export const createDateTimeSlot = (
  day: Date,
  timeSlot: TimeSlot,
  timezone: string = DEFAULT_TIMEZONE
): DateTimeSlot => {
  return {
    start: atTimeOfDay(day, timeSlot.start, timezone),
    end: atTimeOfDay(day, timeSlot.end, timezone),
  };
};

// Date range utilities

/** Local midnights of every calendar day touched by [startDate, endDate]. */
export const getDateRange = (startDate: Date, endDate: Date, timezone: string = DEFAULT_TIMEZONE): Date[] => {
  const dates: Date[] = [];
  let currentDate = moment(startDate).tz(timezone).startOf("day");
  const lastDate = moment(endDate).tz(timezone);

  while (currentDate.isSameOrBefore(lastDate)) {
    dates.push(currentDate.toDate());
    currentDate = currentDate.clone().add(1, "day");
  }

  return dates;
};
