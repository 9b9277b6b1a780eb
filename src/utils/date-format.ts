import { TZDate } from "@date-fns/tz";
import { format } from "date-fns";

export const DEFAULT_DATE_TIME_PATTERN = "yyyy-MM-dd HH:mm:ss";

/**
 * Formats an instant as wall-clock text in the given zone (system zone when omitted).
 * Patterns use date-fns tokens.
 */
export const formatDateTime = (
  instant: Date,
  pattern: string = DEFAULT_DATE_TIME_PATTERN,
  timeZone?: string,
): string => {
  const zoned =
    timeZone === undefined
      ? new TZDate(instant.getTime())
      : new TZDate(instant.getTime(), timeZone);
  return format(zoned, pattern);
};
