import { afterEach, vi } from "vitest";

// Calendar helpers build local-time Date values; pin the zone so week and
// ordinal conversions never straddle a DST change differently per machine.
process.env.TZ = "UTC";

afterEach(() => {
  vi.restoreAllMocks();
});
