import { describe, expect, it, vi } from "vitest";
import nodemailer from "nodemailer";
import {
  renderAppointmentCancellationEmail,
  renderAppointmentConfirmationEmail,
  renderWelcomeEmail,
} from "../templates/email.templates";
import { SmtpEmailService, SmtpEmailOptions } from "../services/email.service";
import { march } from "@/__tests__/helpers/fixtures";

const SETTINGS = { clinicName: "Bright Smile", timezone: "UTC" };

const smtpOptions = (overrides: Partial<SmtpEmailOptions> = {}): SmtpEmailOptions => ({
  enabled: true,
  smtpHost: "localhost",
  smtpPort: 2525,
  secure: false,
  senderAddress: "no-reply@clinic.test",
  senderName: "Bright Smile",
  ...overrides,
});

// jsonTransport renders the message in process instead of opening a connection
const createTransporter = () => nodemailer.createTransport({ jsonTransport: true });

describe("email templates", () => {
  it("renders the welcome message with the credentials", () => {
    const message = renderWelcomeEmail("Bright Smile", {
      name: "Jane Doe",
      username: "jane_7",
      password: "test-password",
      role: "Customer",
    });

    expect(message.subject).toBe("Welcome to Bright Smile - Your Account Details");
    expect(message.text.split("\n").slice(0, 8)).toEqual([
      "Dear Jane Doe,",
      "",
      "Welcome to Bright Smile! Your account has been created successfully.",
      "",
      "Your login details:",
      "- Username: jane_7",
      "- Password: test-password",
      "- Role: Customer",
    ]);
  });

  it("renders the confirmation in the clinic timezone", () => {
    const message = renderAppointmentConfirmationEmail("Bright Smile", "America/New_York", {
      customerName: "Jane Doe",
      dentistName: "Helen Brooks",
      appointmentDateTime: march(4, 15),
      procedureType: "Cleaning",
    });

    expect(message.subject).toBe("Appointment Confirmation - Bright Smile");
    expect(message.text).toContain("- Date & Time: Monday, March 04, 2030 at 10:00\n");
    expect(message.text).toContain("- Dentist: Dr. Helen Brooks\n");
    expect(message.text).toContain("- Procedure: Cleaning\n");
  });

  it("renders the cancellation notice", () => {
    const message = renderAppointmentCancellationEmail("Bright Smile", "UTC", {
      customerName: "Jane Doe",
      appointmentDateTime: march(4, 15, 30),
      procedureType: "Filling",
    });

    expect(message.subject).toBe("Appointment Cancelled - Bright Smile");
    expect(message.text).toContain("- Date & Time: Monday, March 04, 2030 at 15:30\n");
    expect(message.text.endsWith("Best regards,\nBright Smile Team")).toBe(true);
  });
});

describe("SmtpEmailService", () => {
  it("hands the rendered message to the transport", async () => {
    const transporter = createTransporter();
    const sendMail = vi.spyOn(transporter, "sendMail");
    const service = new SmtpEmailService(smtpOptions(), SETTINGS, transporter);

    const sent = await service.sendAppointmentCancellation("jane@example.com", "Jane", march(4, 9), "Cleaning");

    expect(sent).toBe(true);
    expect(sendMail).toHaveBeenCalledWith(
      expect.objectContaining({
        from: { name: "Bright Smile", address: "no-reply@clinic.test" },
        to: "jane@example.com",
        subject: "Appointment Cancelled - Bright Smile",
      })
    );
  });

  it("reports a transport failure as false", async () => {
    const transporter = createTransporter();
    vi.spyOn(transporter, "sendMail").mockRejectedValue(new Error("connection refused"));
    const service = new SmtpEmailService(smtpOptions(), SETTINGS, transporter);

    expect(await service.sendWelcomeEmail("jane@example.com", "Jane", "jane_1", "test-password", "Customer")).toBe(false);
  });

  it("skips delivery when disabled", async () => {
    const transporter = createTransporter();
    const sendMail = vi.spyOn(transporter, "sendMail");
    const service = new SmtpEmailService(smtpOptions({ enabled: false }), SETTINGS, transporter);

    expect(await service.sendWelcomeEmail("jane@example.com", "Jane", "jane_1", "test-password", "Customer")).toBe(true);
    expect(sendMail).not.toHaveBeenCalled();
  });
});
