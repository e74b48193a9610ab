import { vi } from "vitest";
import type { OperationResult } from "@/shared/types/common.types";
import type { CreateCustomerData } from "@/domains/customers/models/customer.model";
import type { CreateDentistData } from "@/domains/dentists/models/dentist.model";
import type { BusinessCalendar } from "@/domains/appointments/services/conflict-checker.service";
import type { EmailService } from "@/domains/notifications/services/email.service";
import type { AuthApiClient } from "@/domains/identity/services/auth-api.client";

// Friday 2030-03-01 09:00 UTC; March 2 and 3 are the weekend, March 4 is a Monday
export const NOW = new Date(Date.UTC(2030, 2, 1, 9, 0));

export const march = (day: number, hour: number, minute: number = 0): Date =>
  new Date(Date.UTC(2030, 2, day, hour, minute));

export const UTC_CALENDAR: BusinessCalendar = {
  openHour: 8,
  closeHour: 18,
  slotMinutes: 30,
  timezone: "UTC",
};

export const createClock = (start: Date = NOW) => {
  let current = new Date(start.getTime());
  const now = (): Date => new Date(current.getTime());
  const set = (date: Date): void => {
    current = new Date(date.getTime());
  };
  return { now, set };
};

export const customerData = (overrides: Partial<CreateCustomerData> = {}): CreateCustomerData => ({
  name: "Jane Doe",
  email: "jane.doe@example.com",
  phone: "555-0100",
  dateOfBirth: null,
  address: "1 Main Street",
  userId: null,
  isActive: true,
  ...overrides,
});

export const dentistData = (overrides: Partial<CreateDentistData> = {}): CreateDentistData => ({
  name: "Helen Brooks",
  email: "helen.brooks@example.com",
  phone: "555-0200",
  licenseNumber: "DDS-1001",
  specialization: "General Dentistry",
  userId: null,
  isActive: true,
  ...overrides,
});

export const createEmailServiceMock = () =>
  ({
    sendWelcomeEmail: vi.fn(async () => true),
    sendAppointmentConfirmation: vi.fn(async () => true),
    sendAppointmentCancellation: vi.fn(async () => true),
  }) satisfies EmailService;

export const createAuthApiMock = () =>
  ({
    createUser: vi.fn(async () => true),
    deleteUserByEmail: vi.fn(async () => true),
    userExistsByEmail: vi.fn(async () => false),
  }) satisfies AuthApiClient;

export const unwrap = <T>(result: OperationResult<T>): T => {
  if (!result.success) {
    throw new Error(`Expected success, got ${result.code}: ${result.message}`);
  }
  return result.data;
};
