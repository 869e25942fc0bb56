import { DateTime, IANAZone } from 'luxon';

/**
 * Source of "now" in the configured timezone. Every timestamp a run uses
 * (file name, date partition, metadata, email) comes from one reading.
 */
export class LocalClock {
  readonly timezone: string;
  private readonly now: () => Date;

  constructor(timezone: string, now: () => Date = () => new Date()) {
    if (!LocalClock.isValidTimezone(timezone)) {
      throw new RangeError(`Unknown timezone: ${timezone}`);
    }
    this.timezone = timezone;
    this.now = now;
  }

  static isValidTimezone(name: string): boolean {
    return IANAZone.isValidZone(name);
  }

  current(): DateTime {
    return DateTime.fromJSDate(this.now(), { zone: this.timezone });
  }
}

/** yyyyMMdd_HHmmss, used in backup file names */
export function formatFileTimestamp(time: DateTime): string {
  return time.toFormat('yyyyMMdd_HHmmss');
}

/** yyyyMMdd, the date partition of an object key */
export function formatPartitionDate(time: DateTime): string {
  return time.toFormat('yyyyMMdd');
}

export function formatDisplayTimestamp(time: DateTime): string {
  return time.toFormat('yyyy-MM-dd HH:mm:ss');
}

/** ISO-8601 with the zone offset, e.g. 2024-03-10T23:58:00.000-03:00 */
export function toIsoTimestamp(time: DateTime): string {
  const iso = time.toISO();
  if (iso === null) {
    throw new RangeError(`Invalid timestamp: ${time.invalidExplanation ?? 'unknown reason'}`);
  }
  return iso;
}
