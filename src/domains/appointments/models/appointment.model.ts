export enum AppointmentStatus {
  SCHEDULED = "Scheduled",
  COMPLETED = "Completed",
  CANCELLED = "Cancelled",
  CANCELLATION_REQUESTED = "CancellationRequested",
}

export const APPOINTMENT_STATUS_LABELS: Record<AppointmentStatus, string> = {
  [AppointmentStatus.SCHEDULED]: "Scheduled",
  [AppointmentStatus.COMPLETED]: "Completed",
  [AppointmentStatus.CANCELLED]: "Cancelled",
  [AppointmentStatus.CANCELLATION_REQUESTED]: "Cancellation Requested",
};

export const getStatusLabel = (status: AppointmentStatus): string => APPOINTMENT_STATUS_LABELS[status];

export type AppointmentAction = "requestCancellation" | "cancel" | "complete";

export interface AppointmentTransition {
  canApply: (from: AppointmentStatus) => boolean;
  to: AppointmentStatus;
  rejection: string;
}

// Every lifecycle rule lives here; the service consults nothing else
export const APPOINTMENT_TRANSITIONS: Record<AppointmentAction, AppointmentTransition> = {
  requestCancellation: {
    canApply: (from) => from === AppointmentStatus.SCHEDULED,
    to: AppointmentStatus.CANCELLATION_REQUESTED,
    rejection: "Only scheduled appointments can be cancelled.",
  },
  cancel: {
    canApply: (from) => from !== AppointmentStatus.COMPLETED,
    to: AppointmentStatus.CANCELLED,
    rejection: "Cannot cancel completed appointments.",
  },
  complete: {
    canApply: (from) => from === AppointmentStatus.SCHEDULED,
    to: AppointmentStatus.COMPLETED,
    rejection: "Only scheduled appointments can be completed.",
  },
};

export const isKnownTransition = (from: AppointmentStatus, to: AppointmentStatus): boolean => {
  if (from === to) {
    return true;
  }
  return Object.values(APPOINTMENT_TRANSITIONS).some((transition) => transition.to === to && transition.canApply(from));
};

export interface Appointment {
  id: number;
  customerId: number;
  dentistId: number;
  appointmentDateTime: Date;
  procedureType: string;
  notes: string;
  status: AppointmentStatus;
  createdAt: Date;
  updatedAt: Date;
}

export type CreateAppointmentData = Omit<Appointment, "id" | "createdAt" | "updatedAt">;

export interface AppointmentFilters {
  customerId?: number | undefined;
  dentistId?: number | undefined;
  startDate?: Date | undefined;
  endDate?: Date | undefined;
  status?: AppointmentStatus | undefined;
  page: number;
  pageSize: number;
}

export interface AppointmentPage {
  appointments: Appointment[];
  total: number;
}

export interface AvailableSlot {
  dentistId: number;
  dentistName: string;
  dateTime: Date;
  durationMinutes: number;
  isAvailable: boolean;
}

export interface AppointmentResponse extends Appointment {
  statusLabel: string;
}

export const toAppointmentResponse = (appointment: Appointment): AppointmentResponse => ({
  ...appointment,
  statusLabel: getStatusLabel(appointment.status),
});

export const cloneAppointment = (appointment: Appointment): Appointment => ({
  ...appointment,
  appointmentDateTime: new Date(appointment.appointmentDateTime.getTime()),
  createdAt: new Date(appointment.createdAt.getTime()),
  updatedAt: new Date(appointment.updatedAt.getTime()),
});
