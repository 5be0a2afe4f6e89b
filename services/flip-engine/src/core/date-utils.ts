import { DateTime } from "luxon";

// Parse ISO date string to DateTime
export function parseDate(date: string): DateTime {
  if (typeof date !== "string") {
    throw new TypeError("date must be a string");
  }

  const parsed = DateTime.fromISO(date, { zone: "utc" });
  if (!parsed.isValid) {
    throw new Error(`Invalid ISO date: ${date}`);
  }

  return parsed.startOf("day");
}

export function today(): DateTime {
  return DateTime.utc().startOf("day");
}

// Add whole months to a date
export function addMonths(date: DateTime, months: number): DateTime {
  assertValidDateTime(date, "date");
  if (!Number.isInteger(months)) {
    throw new TypeError("months must be an integer");
  }
  return date.plus({ months });
}

/**
 * Projected sale date after the market absorbs the property.
 * Fractional absorption rounds up to the next whole month.
 */
export function projectSaleDate(start: DateTime, absorptionMonths: number): DateTime {
  const months = Number.isFinite(absorptionMonths) && absorptionMonths > 0 ? Math.ceil(absorptionMonths) : 0;
  return addMonths(start, months);
}

export function toIsoDate(date: DateTime): string {
  assertValidDateTime(date, "date");
  return date.toFormat("yyyy-MM-dd");
}

function assertValidDateTime(value: DateTime, name: string): void {
  if (!(value instanceof DateTime)) {
    throw new TypeError(`${name} must be a DateTime`);
  }
  if (!value.isValid) {
    throw new Error(`${name} must be a valid DateTime`);
  }
}
