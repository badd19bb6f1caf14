import { describe, expect, it } from "vitest";
import { DayOfWeek } from "@/shared/types/common.types";
import { buildClinic, openEveryDay } from "@/__tests__/helpers/builders";
import { ClinicStatus } from "../models/clinic.model";

const SATURDAY = new Date("2025-03-01T00:00:00Z");

const at = (time: string): Date => new Date(`2025-03-01T${time}:00Z`);

describe("ClinicEntity", () => {
  it("cuts the break out of the opening hours", () => {
    const clinic = buildClinic();

    expect(clinic.openWindowsOn(SATURDAY)).toEqual([
      { start: at("09:00"), end: at("13:00") },
      { start: at("14:00"), end: at("18:00") },
    ]);
  });

  it("has no windows on a closed day", () => {
    const clinic = buildClinic({
      workingHours: openEveryDay("09:00", "18:00").map((hours) =>
        hours.dayOfWeek === DayOfWeek.SATURDAY ? { ...hours, isClosed: true } : hours
      ),
    });

    expect(clinic.openWindowsOn(SATURDAY)).toEqual([]);
    expect(clinic.isOpenDuring(at("10:00"), at("10:30"))).toBe(false);
  });

  it("requires the whole interval to fit inside one window", () => {
    const clinic = buildClinic();

    expect(clinic.isOpenDuring(at("12:30"), at("13:00"))).toBe(true);
    expect(clinic.isOpenDuring(at("12:45"), at("13:15"))).toBe(false);
    expect(clinic.isOpenDuring(at("17:45"), at("18:15"))).toBe(false);
  });

  it("reads opening hours in the clinic's own timezone", () => {
    const clinic = buildClinic({ timezone: "Asia/Kolkata", workingHours: openEveryDay("09:00", "17:00") });

    // 09:00 in Kolkata is 03:30 UTC
    expect(clinic.isOpenDuring(new Date("2025-03-01T03:30:00Z"), new Date("2025-03-01T04:00:00Z"))).toBe(true);
    expect(clinic.isOpenDuring(new Date("2025-03-01T03:29:00Z"), new Date("2025-03-01T03:59:00Z"))).toBe(false);
  });

  it("is only operational while active", () => {
    expect(buildClinic().isOperational()).toBe(true);
    expect(buildClinic({ status: ClinicStatus.SUSPENDED }).isOperational()).toBe(false);
  });
});
