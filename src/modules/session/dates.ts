/**
 * Local midnight of the given instant
 */
export const startOfDay = (date: Date): Date => {
  const start = new Date(date.getTime());
  start.setHours(0, 0, 0, 0);
  return start;
};

/**
 * True when `now` falls on a later local calendar day than `since`
 */
export const isLaterDay = (now: Date, since: Date): boolean =>
  startOfDay(now).getTime() > startOfDay(since).getTime();
