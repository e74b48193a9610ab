import { formatDateTime } from "@/shared/utils/date";

export interface EmailMessage {
  subject: string;
  text: string;
}

export const APPOINTMENT_DATE_FORMAT = "dddd, MMMM DD, YYYY [at] HH:mm";

export interface WelcomeEmailData {
  name: string;
  username: string;
  password: string;
  role: string;
}

export interface AppointmentConfirmationData {
  customerName: string;
  dentistName: string;
  appointmentDateTime: Date;
  procedureType: string;
}

export interface AppointmentCancellationData {
  customerName: string;
  appointmentDateTime: Date;
  procedureType: string;
}

export const renderWelcomeEmail = (clinicName: string, data: WelcomeEmailData): EmailMessage => ({
  subject: `Welcome to ${clinicName} - Your Account Details`,
  text: [
    `Dear ${data.name},`,
    "",
    `Welcome to ${clinicName}! Your account has been created successfully.`,
    "",
    "Your login details:",
    `- Username: ${data.username}`,
    `- Password: ${data.password}`,
    `- Role: ${data.role}`,
    "",
    "Please keep these credentials safe and change your password after your first login.",
    "",
    "If you have any questions, please contact our support team.",
    "",
    "Best regards,",
    `${clinicName} Team`,
  ].join("\n"),
});

export const renderAppointmentConfirmationEmail = (
  clinicName: string,
  timezone: string,
  data: AppointmentConfirmationData
): EmailMessage => ({
  subject: `Appointment Confirmation - ${clinicName}`,
  text: [
    `Dear ${data.customerName},`,
    "",
    "Your appointment has been confirmed!",
    "",
    "Appointment Details:",
    `- Date & Time: ${formatDateTime(data.appointmentDateTime, APPOINTMENT_DATE_FORMAT, timezone)}`,
    `- Dentist: Dr. ${data.dentistName}`,
    `- Procedure: ${data.procedureType}`,
    "",
    "Please arrive 15 minutes before your scheduled appointment time.",
    "",
    "If you need to reschedule or cancel, please contact us as soon as possible.",
    "",
    "Best regards,",
    `${clinicName} Team`,
  ].join("\n"),
});

export const renderAppointmentCancellationEmail = (
  clinicName: string,
  timezone: string,
  data: AppointmentCancellationData
): EmailMessage => ({
  subject: `Appointment Cancelled - ${clinicName}`,
  text: [
    `Dear ${data.customerName},`,
    "",
    "Your appointment has been cancelled.",
    "",
    "Cancelled Appointment Details:",
    `- Date & Time: ${formatDateTime(data.appointmentDateTime, APPOINTMENT_DATE_FORMAT, timezone)}`,
    `- Procedure: ${data.procedureType}`,
    "",
    "If you would like to reschedule, please contact us at your convenience.",
    "",
    "Best regards,",
    `${clinicName} Team`,
  ].join("\n"),
});
