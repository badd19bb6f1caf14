import { z } from "zod";
import { DateTimeSlot, DayOfWeek } from "@/shared/types/common.types";
import { createDateTimeSlot, getDayOfWeek, isValidTimeString, startOfDay, timeStringToMinutes } from "@/shared/utils/date";

export enum ClinicStatus {
  ACTIVE = "active",
  INACTIVE = "inactive",
  PENDING_VERIFICATION = "pending_verification",
  SUSPENDED = "suspended",
}

export interface WorkingHours {
  dayOfWeek: DayOfWeek;
  startTime: string;
  endTime: string;
  isClosed: boolean;
  breakStart: string | null;
  breakEnd: string | null;
}

export interface ClinicProps {
  id: string;
  name: string;
  city: string;
  timezone: string;
  status: ClinicStatus;
  workingHours: WorkingHours[];
}

const timeString = z.string().refine(isValidTimeString, "Expected HH:mm");

export const clinicSchema = z.object({
  id: z.string(),
  name: z.string(),
  city: z.string(),
  timezone: z.string(),
  status: z.nativeEnum(ClinicStatus),
  workingHours: z.array(
    z.object({
      dayOfWeek: z.nativeEnum(DayOfWeek),
      startTime: timeString,
      endTime: timeString,
      isClosed: z.boolean(),
      breakStart: timeString.nullable(),
      breakEnd: timeString.nullable(),
    })
  ),
});

export class ClinicEntity {
  private constructor(private readonly props: ClinicProps) {}

  static create(props: ClinicProps): ClinicEntity {
    return new ClinicEntity(props);
  }

  get id(): string {
    return this.props.id;
  }

  get name(): string {
    return this.props.name;
  }

  get city(): string {
    return this.props.city;
  }

  get timezone(): string {
    return this.props.timezone;
  }

  get status(): ClinicStatus {
    return this.props.status;
  }

  isOperational(): boolean {
    return this.props.status === ClinicStatus.ACTIVE;
  }

  /** Opening hours on the local calendar day of `day`, with the break cut out. */
  openWindowsOn(day: Date): DateTimeSlot[] {
    const dayOfWeek = getDayOfWeek(day, this.props.timezone);
    const hours = this.props.workingHours.find((entry) => entry.dayOfWeek === dayOfWeek);

    if (!hours || hours.isClosed) {
      return [];
    }

    const open = createDateTimeSlot(day, { start: hours.startTime, end: hours.endTime }, this.props.timezone);
    if (open.start >= open.end) {
      return [];
    }

    if (!hours.breakStart || !hours.breakEnd || timeStringToMinutes(hours.breakStart) >= timeStringToMinutes(hours.breakEnd)) {
      return [open];
    }

    const pause = createDateTimeSlot(day, { start: hours.breakStart, end: hours.breakEnd }, this.props.timezone);

    return [
      { start: open.start, end: pause.start < open.end ? pause.start : open.end },
      { start: pause.end > open.start ? pause.end : open.start, end: open.end },
    ].filter((window) => window.start < window.end);
  }

  /** True when [start, end) lies entirely inside one open window. */
  isOpenDuring(start: Date, end: Date): boolean {
    return this.openWindowsOn(startOfDay(start, this.props.timezone)).some(
      (window) => window.start <= start && end <= window.end
    );
  }

  toJSON(): ClinicProps {
    return {
      ...this.props,
      workingHours: this.props.workingHours.map((hours) => ({ ...hours })),
    };
  }
}
