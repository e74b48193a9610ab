import nodemailer, { Transporter } from "nodemailer";
import type { Logger } from "pino";
import { config } from "@/shared/config/environment";
import { createModuleLogger } from "@/shared/config/logger";
import {
  EmailMessage,
  renderAppointmentCancellationEmail,
  renderAppointmentConfirmationEmail,
  renderWelcomeEmail,
} from "../templates/email.templates";

/** Outbound mail. Results are advisory: callers never fail because a message was not sent. */
export interface EmailService {
  sendWelcomeEmail(email: string, name: string, username: string, password: string, role: string): Promise<boolean>;
  sendAppointmentConfirmation(
    email: string,
    customerName: string,
    dentistName: string,
    appointmentDateTime: Date,
    procedureType: string
  ): Promise<boolean>;
  sendAppointmentCancellation(
    email: string,
    customerName: string,
    appointmentDateTime: Date,
    procedureType: string
  ): Promise<boolean>;
}

export interface EmailSettings {
  clinicName: string;
  timezone: string;
}

const DEFAULT_SETTINGS: EmailSettings = {
  clinicName: config.email.senderName,
  timezone: config.scheduling.timezone,
};

abstract class TemplateEmailService implements EmailService {
  protected constructor(
    protected readonly logger: Logger,
    protected readonly settings: EmailSettings
  ) {}

  protected abstract deliver(to: string, message: EmailMessage): Promise<void>;

  async sendWelcomeEmail(email: string, name: string, username: string, password: string, role: string) {
    return this.send("welcome", email, renderWelcomeEmail(this.settings.clinicName, { name, username, password, role }));
  }

  async sendAppointmentConfirmation(
    email: string,
    customerName: string,
    dentistName: string,
    appointmentDateTime: Date,
    procedureType: string
  ) {
    return this.send(
      "appointment confirmation",
      email,
      renderAppointmentConfirmationEmail(this.settings.clinicName, this.settings.timezone, {
        customerName,
        dentistName,
        appointmentDateTime,
        procedureType,
      })
    );
  }

  async sendAppointmentCancellation(
    email: string,
    customerName: string,
    appointmentDateTime: Date,
    procedureType: string
  ) {
    return this.send(
      "appointment cancellation",
      email,
      renderAppointmentCancellationEmail(this.settings.clinicName, this.settings.timezone, {
        customerName,
        appointmentDateTime,
        procedureType,
      })
    );
  }

  private async send(kind: string, to: string, message: EmailMessage): Promise<boolean> {
    try {
      await this.deliver(to, message);
      this.logger.info({ to, subject: message.subject }, `Sent ${kind} email`);
      return true;
    } catch (error) {
      this.logger.error({ err: error, to, subject: message.subject }, `Failed to send ${kind} email`);
      return false;
    }
  }
}

export interface SmtpEmailOptions {
  enabled: boolean;
  smtpHost: string;
  smtpPort: number;
  secure: boolean;
  username?: string | undefined;
  password?: string | undefined;
  senderAddress: string;
  senderName: string;
}

export class SmtpEmailService extends TemplateEmailService {
  private readonly transporter: Transporter;

  constructor(
    private readonly options: SmtpEmailOptions = config.email,
    settings: EmailSettings = DEFAULT_SETTINGS,
    transporter?: Transporter
  ) {
    super(createModuleLogger("SmtpEmailService"), settings);

    this.transporter =
      transporter ??
      nodemailer.createTransport({
        host: options.smtpHost,
        port: options.smtpPort,
        secure: options.secure,
        ...(options.username ? { auth: { user: options.username, pass: options.password } } : {}),
      });
  }

  protected async deliver(to: string, message: EmailMessage): Promise<void> {
    if (!this.options.enabled) {
      this.logger.info({ to, subject: message.subject }, "Email delivery disabled, message not sent");
      return;
    }

    await this.transporter.sendMail({
      from: { name: this.options.senderName, address: this.options.senderAddress },
      to,
      subject: message.subject,
      text: message.text,
    });
  }
}

// Development stand-in: the rendered message goes to the log instead of a mail server
export class LoggingEmailService extends TemplateEmailService {
  constructor(settings: EmailSettings = DEFAULT_SETTINGS) {
    super(createModuleLogger("LoggingEmailService"), settings);
  }

  protected async deliver(to: string, message: EmailMessage): Promise<void> {
    this.logger.info({ to, subject: message.subject, body: message.text }, "Email (not delivered)");
  }
}
