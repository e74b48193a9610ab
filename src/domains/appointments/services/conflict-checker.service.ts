import { createModuleLogger } from "@/shared/config/logger";
import { config } from "@/shared/config/environment";
import {
  addMinutes,
  atLocalTime,
  getCalendarDays,
  getMinutesOfDay,
  isWeekend,
  minutesToTimeString,
} from "@/shared/utils/date";
import { AppointmentStatus } from "../models/appointment.model";
import type { AppointmentRepository } from "../repositories/appointment.repository";

const moduleLogger = createModuleLogger("ConflictCheckerService");

export interface BusinessCalendar {
  openHour: number;
  closeHour: number;
  slotMinutes: number;
  timezone: string;
}

export const DEFAULT_BUSINESS_CALENDAR: BusinessCalendar = {
  openHour: 8,
  closeHour: 18,
  slotMinutes: 30,
  timezone: config.scheduling.timezone,
};

export interface DateTimeValidation {
  isValid: boolean;
  message: string;
}

export type Clock = () => Date;

export class ConflictCheckerService {
  constructor(
    private readonly appointmentRepository: AppointmentRepository,
    private readonly calendar: BusinessCalendar = DEFAULT_BUSINESS_CALENDAR,
    private readonly now: Clock = () => new Date()
  ) {}

  get slotMinutes(): number {
    return this.calendar.slotMinutes;
  }

  // First failing rule wins: past, then business hours, then weekend
  validateDateTime(dateTime: Date): DateTimeValidation {
    if (Number.isNaN(dateTime.getTime())) {
      return { isValid: false, message: "Invalid appointment date/time." };
    }

    if (dateTime.getTime() <= this.now().getTime()) {
      return { isValid: false, message: "Cannot schedule appointments in the past." };
    }

    const minutes = getMinutesOfDay(dateTime, this.calendar.timezone);
    const open = this.calendar.openHour * 60;
    const close = this.calendar.closeHour * 60;

    if (minutes < open || minutes >= close) {
      return {
        isValid: false,
        message: `Appointments can only be scheduled between ${minutesToTimeString(open)} and ${minutesToTimeString(close)}.`,
      };
    }

    if (isWeekend(dateTime, this.calendar.timezone)) {
      return { isValid: false, message: "Appointments cannot be scheduled on weekends." };
    }

    return { isValid: true, message: "" };
  }

  async hasCustomerConflict(customerId: number, dateTime: Date, excludeId?: number): Promise<boolean> {
    return this.appointmentRepository.hasCustomerConflict(customerId, dateTime, excludeId);
  }

  async hasDentistConflict(dentistId: number, dateTime: Date, excludeId?: number): Promise<boolean> {
    return this.appointmentRepository.hasDentistConflict(dentistId, dateTime, excludeId);
  }

  /**
   * Free slot starts for a dentist between the business opening of `startDate`'s day and the
   * business close of `endDate`'s day. Past slots are not filtered out.
   */
  async findAvailableSlots(dentistId: number, startDate: Date, endDate: Date): Promise<Date[]> {
    const days = getCalendarDays(startDate, endDate, this.calendar.timezone).filter(
      (day) => !isWeekend(day.toDate(), this.calendar.timezone)
    );

    const firstDay = days[0];
    const lastDay = days[days.length - 1];
    if (!firstDay || !lastDay) {
      return [];
    }

    const windowStart = atLocalTime(firstDay, this.calendar.openHour);
    const windowEnd = atLocalTime(lastDay, this.calendar.closeHour);

    const booked = await this.appointmentRepository.findByDateRange(windowStart, windowEnd);
    const occupied = new Set(
      booked
        .filter((a) => a.dentistId === dentistId && a.status !== AppointmentStatus.CANCELLED)
        .map((a) => a.appointmentDateTime.getTime())
    );

    const slots: Date[] = [];

    for (const day of days) {
      const close = atLocalTime(day, this.calendar.closeHour);

      for (
        let slot = atLocalTime(day, this.calendar.openHour);
        slot.getTime() < close.getTime();
        slot = addMinutes(slot, this.calendar.slotMinutes)
      ) {
        if (!occupied.has(slot.getTime())) {
          slots.push(slot);
        }
      }
    }

    moduleLogger.debug(
      { dentistId, startDate, endDate, available: slots.length, occupied: occupied.size },
      "Available slots computed"
    );

    return slots;
  }

  async isSlotAvailable(dentistId: number, dateTime: Date): Promise<boolean> {
    if (!this.validateDateTime(dateTime).isValid) {
      return false;
    }
    return !(await this.hasDentistConflict(dentistId, dateTime));
  }
}
