import { addDays } from "date-fns";
import { describe, expect, it } from "vitest";

import {
  currentFiscalYear,
  fiscalYearBounds,
  fiscalYearOf,
  parseFiscalYearLabel,
  registrationDeadline
} from "../src/domain/calendar/fiscal-year.js";
import type { FiscalCalendar } from "../src/domain/calendar/types.js";
import { calendarDate, formatCalendarDate } from "../src/shared/dates.js";
import { captureCoreError } from "./helpers.js";

describe("fiscal year calendar", () => {
  it("assigns the day before 6 April to the previous fiscal year", () => {
    expect(fiscalYearOf("2024-04-05")).toBe("2023-24");
    expect(fiscalYearOf("2024-04-06")).toBe("2024-25");
    expect(fiscalYearOf("2025-01-15")).toBe("2024-25");
    expect(fiscalYearOf("2024-12-31")).toBe("2024-25");
  });

  it("accepts Date values and pads the two-digit end year across a century", () => {
    expect(fiscalYearOf(new Date(2024, 3, 5, 23, 59))).toBe("2023-24");
    expect(fiscalYearOf("2099-06-01")).toBe("2099-00");
    expect(fiscalYearOf("2008-05-01")).toBe("2008-09");
  });

  it("returns the start and end dates of a fiscal year", () => {
    expect(fiscalYearBounds("2024-25")).toEqual({ start: "2024-04-06", end: "2025-04-05" });
    expect(fiscalYearBounds("2023-24")).toEqual({ start: "2023-04-06", end: "2024-04-05" });
  });

  it("round-trips every date through its fiscal year bounds", () => {
    let current = calendarDate(2023, 1, 1);
    const last = calendarDate(2026, 12, 31);

    while (current.getTime() <= last.getTime()) {
      const label = fiscalYearOf(current);
      const bounds = fiscalYearBounds(label);
      const date = formatCalendarDate(current);

      expect(fiscalYearOf(bounds.start)).toBe(label);
      expect(fiscalYearOf(bounds.end)).toBe(label);
      expect(bounds.start <= date && date <= bounds.end).toBe(true);
      current = addDays(current, 1);
    }
  });

  it("rejects malformed fiscal year labels", () => {
    expect(parseFiscalYearLabel("2024-25")).toBe(2024);
    expect(captureCoreError(() => parseFiscalYearLabel("2024-26"), "CONFIGURATION_ERROR").details).toEqual({
      label: "2024-26"
    });
    captureCoreError(() => fiscalYearBounds("24-25"), "CONFIGURATION_ERROR");
  });

  it("rejects dates that do not exist", () => {
    const error = captureCoreError(() => fiscalYearOf("2024-02-30"), "VALIDATION_ERROR");
    expect(error.message).toBe("Invalid date value: 2024-02-30");
  });

  it("derives the current fiscal year from an injected date", () => {
    expect(currentFiscalYear("2026-10-19")).toBe("2026-27");
  });
});

describe("registration deadline", () => {
  it("is 5 October after the end of the fiscal year trading started in", () => {
    expect(registrationDeadline("2024-05-01")).toBe("2025-10-05");
    expect(registrationDeadline("2024-03-01")).toBe("2024-10-05");
    expect(registrationDeadline("2024-04-06")).toBe("2025-10-05");
  });

  it("rolls into the next year when the fiscal year ends after the deadline day", () => {
    const calendarYear: FiscalCalendar = {
      startMonth: 1,
      startDay: 1,
      registrationDeadlineMonth: 10,
      registrationDeadlineDay: 5
    };

    expect(fiscalYearBounds("2024-25", calendarYear)).toEqual({ start: "2024-01-01", end: "2024-12-31" });
    expect(registrationDeadline("2024-03-10", calendarYear)).toBe("2025-10-05");
  });

  it("keeps the same-year deadline when the fiscal year ends on the deadline day", () => {
    const endsOnDeadline: FiscalCalendar = {
      startMonth: 10,
      startDay: 6,
      registrationDeadlineMonth: 10,
      registrationDeadlineDay: 5
    };

    expect(registrationDeadline("2024-11-01", endsOnDeadline)).toBe("2025-10-05");
  });

  it("rejects calendar configurations without a valid start day", () => {
    const invalid: FiscalCalendar = {
      startMonth: 4,
      startDay: 31,
      registrationDeadlineMonth: 10,
      registrationDeadlineDay: 5
    };

    captureCoreError(() => fiscalYearOf("2024-06-01", invalid), "CONFIGURATION_ERROR");
  });
});
