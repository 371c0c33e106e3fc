export const FIXED_TIME = "2026-03-01T12:00:00.000Z";

export function fixedClock(): () => Date {
  return () => new Date(FIXED_TIME);
}

/**
 * Clock advancing one second per call from FIXED_TIME.
 */
export function tickingClock(): () => Date {
  let tick = 0;
  return () => new Date(Date.parse(FIXED_TIME) + 1000 * tick++);
}
