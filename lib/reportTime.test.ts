import { describe, it, expect } from "vitest";
import { formatDisplayTime, reportFolderName, timeFields } from "./reportTime";

const at = new Date("2025-06-26T04:03:09.000Z");

describe("report time fields", () => {
  it("derives date, hour and minute in UTC", () => {
    expect(timeFields(at)).toEqual({
      timestamp: "2025-06-26T04:03:09.000Z",
      date: "2025-06-26",
      hour: 4,
      minute: 3,
    });
  });

  it("names the report folder after the millisecond of submission and the tag", () => {
    expect(reportFolderName(at, "AB12")).toBe("2025-06-26_04-03-09-000_AB12");
    expect(reportFolderName(new Date("2025-06-26T04:03:09.870Z"), "CD34")).toBe(
      "2025-06-26_04-03-09-870_CD34"
    );
  });

  it("formats display times in the configured zone", () => {
    expect(formatDisplayTime(at, "UTC", false)).toBe("06/26/2025, 04:03:09 UTC");
  });
});
