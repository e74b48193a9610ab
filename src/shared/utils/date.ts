import moment from "moment-timezone";
import { config } from "@/shared/config/environment";

// Clinic timezone from configuration (can be overridden per call)
const DEFAULT_TIMEZONE = config.scheduling.timezone;

export enum DayOfWeek {
  SUNDAY = 0,
  MONDAY = 1,
  TUESDAY = 2,
  WEDNESDAY = 3,
  THURSDAY = 4,
  FRIDAY = 5,
  SATURDAY = 6,
}

// Date formatting utilities
export const formatDateTime = (
  date: Date,
  format: string = "YYYY-MM-DD HH:mm:ss",
  timezone: string = DEFAULT_TIMEZONE
): string => {
  return moment(date).tz(timezone).format(format);
};

// Time utilities
export const minutesToTimeString = (minutes: number): string => {
  const hours = Math.floor(minutes / 60);
  const mins = minutes % 60;
  return `${hours.toString().padStart(2, "0")}:${mins.toString().padStart(2, "0")}`;
};

// Minutes since local midnight, seconds included as a fraction
export const getMinutesOfDay = (date: Date, timezone: string = DEFAULT_TIMEZONE): number => {
  const local = moment(date).tz(timezone);
  return local.hours() * 60 + local.minutes() + local.seconds() / 60 + local.milliseconds() / 60000;
};

// Day of week utilities
export const isWeekend = (date: Date, timezone: string = DEFAULT_TIMEZONE): boolean => {
  const day = moment(date).tz(timezone).day();
  return day === DayOfWeek.SATURDAY || day === DayOfWeek.SUNDAY;
};

// Calendar days (local midnight) from the day of `start` through the day of `end`, inclusive
export const getCalendarDays = (start: Date, end: Date, timezone: string = DEFAULT_TIMEZONE): moment.Moment[] => {
  const days: moment.Moment[] = [];
  const current = moment(start).tz(timezone).startOf("day");
  const last = moment(end).tz(timezone).startOf("day");

  while (current.isSameOrBefore(last)) {
    days.push(current.clone());
    current.add(1, "day");
  }

  return days;
};

// Instant at the given local time of a calendar day
export const atLocalTime = (day: moment.Moment, hour: number, minute: number = 0): Date => {
  return day.clone().hour(hour).minute(minute).second(0).millisecond(0).toDate();
};

export const addMinutes = (date: Date, minutes: number): Date => {
  return new Date(date.getTime() + minutes * 60000);
};
