import { describe, it, expect } from "@jest/globals";
import { getDateStringWithDash, getTimestampWithTimezone } from "@/utils/timestamp";

describe("timestamp", () => {
  // 로컬 시간 기준으로 생성해 TZ와 무관하게 검증
  const localDate = new Date(2025, 0, 5, 9, 8, 7, 6);

  it("getTimestampWithTimezone: 로컬 시각 + 오프셋", () => {
    const timestamp = getTimestampWithTimezone(localDate);

    expect(timestamp.startsWith("2025-01-05T09:08:07.006")).toBe(true);
    expect(timestamp).toMatch(/[+-]\d{2}:\d{2}$/);
  });

  it("getDateStringWithDash: YYYY-MM-DD", () => {
    expect(getDateStringWithDash(localDate)).toBe("2025-01-05");
  });
});
