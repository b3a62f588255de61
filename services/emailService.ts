import nodemailer from "nodemailer";
import type { SendMailOptions, Transporter } from "nodemailer";
import type { RemoteModeConfig } from "../config/reportConfig";

// Structural view of a nodemailer transporter, so tests can record messages
export interface MailTransport {
  sendMail(options: SendMailOptions): Promise<unknown>;
  verify?(): Promise<unknown>;
}

export interface EmbeddedAttachment {
  filename: string;
  contentType: string;
  content: Buffer;
}

export interface ReportEmail {
  subject: string;
  textBody: string;
  htmlBody: string;
  attachments: EmbeddedAttachment[];
  urgent: boolean;
}

export interface MailRoute {
  from: string;
  to: string;
}

// Added on top of nodemailer's own X-Priority / X-MSMail-Priority / Importance
export const URGENT_HEADERS: Record<string, string> = {
  Priority: "urgent",
  "X-Mailer-Priority": "1",
  "X-Gmail-Importance": "1",
  "X-Google-Priority": "High",
};

/**
 * Plain-text and HTML alternatives plus one binary part per embedded image.
 * Urgent reports get priority headers.
 */
export function composeReportEmail(email: ReportEmail, route: MailRoute): SendMailOptions {
  const options: SendMailOptions = {
    from: route.from,
    to: route.to,
    subject: email.subject,
    text: email.textBody,
    html: email.htmlBody,
  };

  if (email.attachments.length > 0) {
    options.attachments = email.attachments.map((attachment) => ({
      filename: attachment.filename,
      content: attachment.content,
      contentType: attachment.contentType,
    }));
  }

  if (email.urgent) {
    options.priority = "high";
    options.headers = { ...URGENT_HEADERS };
  }

  return options;
}

export class ReportNotifier {
  constructor(private readonly transport: MailTransport, private readonly route: MailRoute) {}

  describe(): string {
    return `${this.route.from} -> ${this.route.to}`;
  }

  async send(email: ReportEmail): Promise<void> {
    console.log("Sending report email");
    console.log("   To:", this.route.to);
    console.log("   Subject:", email.subject);
    console.log("   Attachments:", email.attachments.length);

    await this.transport.sendMail(composeReportEmail(email, this.route));
  }

  // Startup check only; a failing check is logged and does not stop the service
  async verify(): Promise<boolean> {
    if (!this.transport.verify) return true;
    try {
      await this.transport.verify();
      console.log("Mail transport is ready");
      return true;
    } catch (error) {
      console.warn("Mail transport check failed on startup:", error);
      return false;
    }
  }
}

export function createSmtpTransport(smtp: RemoteModeConfig["smtp"]): Transporter {
  return nodemailer.createTransport({
    host: smtp.host,
    port: smtp.port,
    secure: smtp.secure,
    auth: smtp.user ? { user: smtp.user, pass: smtp.pass } : undefined,
  });
}
