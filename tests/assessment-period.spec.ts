import { addDays } from "date-fns";
import { describe, expect, it } from "vitest";

import {
  assessmentPeriod,
  assessmentPeriodsBetween,
  nextAssessmentPeriod,
  periodContains
} from "../src/domain/calendar/assessment-period.js";
import { formatCalendarDate, parseCalendarDate } from "../src/shared/dates.js";
import { captureCoreError } from "./helpers.js";

describe("assessment periods", () => {
  it("starts in the reference month once the anchor day is reached", () => {
    expect(assessmentPeriod("2024-06-20", 15)).toEqual({ start: "2024-06-15", end: "2024-07-14" });
    expect(assessmentPeriod("2024-06-15", 15)).toEqual({ start: "2024-06-15", end: "2024-07-14" });
  });

  it("starts in the previous month before the anchor day", () => {
    expect(assessmentPeriod("2024-06-10", 15)).toEqual({ start: "2024-05-15", end: "2024-06-14" });
    expect(assessmentPeriod("2025-01-05", 10)).toEqual({ start: "2024-12-10", end: "2025-01-09" });
  });

  it("crosses the year end", () => {
    expect(assessmentPeriod("2024-12-25", 20)).toEqual({ start: "2024-12-20", end: "2025-01-19" });
  });

  it("handles February for the first and last allowed anchor days", () => {
    expect(assessmentPeriod("2024-02-28", 28)).toEqual({ start: "2024-02-28", end: "2024-03-27" });
    expect(assessmentPeriod("2023-03-01", 28)).toEqual({ start: "2023-02-28", end: "2023-03-27" });
    expect(assessmentPeriod("2024-02-29", 1)).toEqual({ start: "2024-02-01", end: "2024-02-29" });
  });

  it("rejects anchor days outside 1-28", () => {
    for (const anchorDay of [0, 29, 31, -1, 1.5]) {
      const error = captureCoreError(() => assessmentPeriod("2024-06-20", anchorDay), "CONFIGURATION_ERROR");
      expect(error.details).toEqual({ anchorDay });
    }
  });

  it("advances by one calendar month", () => {
    expect(nextAssessmentPeriod("2024-12-15", 15)).toEqual({ start: "2025-01-15", end: "2025-02-14" });
    expect(nextAssessmentPeriod("2024-01-31", 28)).toEqual({ start: "2024-02-28", end: "2024-03-27" });
  });

  it("produces contiguous, gap-free periods", () => {
    for (const anchorDay of [1, 15, 28]) {
      let period = assessmentPeriod("2023-11-30", anchorDay);

      for (let index = 0; index < 30; index += 1) {
        const next = nextAssessmentPeriod(period.start, anchorDay);
        expect(formatCalendarDate(addDays(parseCalendarDate(period.end), 1))).toBe(next.start);
        expect(next.start > period.end).toBe(true);
        period = next;
      }
    }
  });

  it("places every date in exactly the period computed for it", () => {
    let date = parseCalendarDate("2024-01-01");

    for (let index = 0; index < 400; index += 1) {
      const period = assessmentPeriod(date, 12);
      expect(periodContains(period, date)).toBe(true);
      expect(periodContains(nextAssessmentPeriod(period.start, 12), date)).toBe(false);
      date = addDays(date, 1);
    }
  });

  it("lists the periods covering a date range", () => {
    expect(assessmentPeriodsBetween("2024-01-20", "2024-04-02", 15)).toEqual([
      { start: "2024-01-15", end: "2024-02-14" },
      { start: "2024-02-15", end: "2024-03-14" },
      { start: "2024-03-15", end: "2024-04-14" }
    ]);
    expect(assessmentPeriodsBetween("2024-06-20", "2024-06-20", 15)).toEqual([
      { start: "2024-06-15", end: "2024-07-14" }
    ]);
  });

  it("rejects an inverted range", () => {
    const error = captureCoreError(() => assessmentPeriodsBetween("2024-05-01", "2024-04-01", 15), "VALIDATION_ERROR");
    expect(error.details).toEqual({ from: "2024-05-01", to: "2024-04-01" });
  });
});
