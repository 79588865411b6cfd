import nodemailer from "nodemailer";
import type { Transporter } from "nodemailer";
import { NotificationError, errorMessage } from "./errors.js";
import type { BuildOutcome } from "./types.js";

export interface NotificationMessage {
  to: string;
  subject: string;
  text: string;
}

export interface Notifier {
  send(message: NotificationMessage): Promise<void>;
}

export interface SmtpSettings {
  host: string | null;
  port: number;
  secure: boolean;
  user: string | null;
  pass: string | null;
  from: string;
}

export interface NotificationLogger {
  info(message: string): void;
  warn(message: string): void;
}

const DEFAULT_SMTP_PORT = 587;
const DEFAULT_SENDER = "isobuild@localhost";

export function smtpSettingsFromEnv(env: NodeJS.ProcessEnv = process.env): SmtpSettings {
  const port = Number.parseInt(env.ISOBUILD_SMTP_PORT ?? "", 10);
  return {
    host: env.ISOBUILD_SMTP_HOST?.trim() || null,
    port: Number.isInteger(port) && port > 0 ? port : DEFAULT_SMTP_PORT,
    secure: env.ISOBUILD_SMTP_SECURE === "true" || env.ISOBUILD_SMTP_SECURE === "1",
    user: env.ISOBUILD_SMTP_USER || null,
    pass: env.ISOBUILD_SMTP_PASS || null,
    from: env.ISOBUILD_SMTP_FROM?.trim() || DEFAULT_SENDER,
  };
}

/** Wraps a nodemailer transport. The caller owns transport lifetime. */
export function createTransportNotifier(transport: Transporter, from: string): Notifier {
  return {
    async send(message) {
      await transport.sendMail({
        from,
        to: message.to,
        subject: message.subject,
        text: message.text,
      });
    },
  };
}

export function createSmtpNotifier(settings: SmtpSettings): Notifier {
  return {
    async send(message) {
      if (!settings.host) {
        throw new Error("ISOBUILD_SMTP_HOST is not set.");
      }
      const transport = nodemailer.createTransport({
        host: settings.host,
        port: settings.port,
        secure: settings.secure,
        auth: settings.user ? { user: settings.user, pass: settings.pass ?? "" } : undefined,
      });
      try {
        await createTransportNotifier(transport, settings.from).send(message);
      } finally {
        transport.close();
      }
    },
  };
}

function formatBytes(bytes: number): string {
  return `${bytes.toString()} byte${bytes === 1 ? "" : "s"}`;
}

export function composeNotification(outcome: BuildOutcome, recipient: string): NotificationMessage {
  const mode = outcome.dryRun ? "Dry run" : "Build";
  const status = outcome.success ? "succeeded" : "failed";
  const lines = [
    `${mode} ${status}: ${outcome.outputPath}`,
    "",
    `Label: ${outcome.label ?? "(none)"}`,
    `Entries: ${outcome.entryCount.toString()}`,
    `Payload: ${formatBytes(outcome.totalBytes)}`,
    `Written: ${formatBytes(outcome.bytesWritten)}`,
  ];
  if (outcome.imageChecksum) {
    lines.push(`Checksum: ${outcome.imageChecksum}`);
  }
  if (outcome.archivePath) {
    lines.push(`Archive: ${outcome.archivePath}`);
  }
  lines.push(`Elapsed: ${(outcome.elapsedMs / 1000).toFixed(1)}s`);

  if (outcome.errors.length > 0) {
    lines.push("", `Errors (${outcome.errors.length.toString()}):`);
    for (const error of outcome.errors) {
      const scope = error.file ? `${error.file}: ` : "";
      lines.push(`  - [${error.kind}${error.fatal ? ", fatal" : ""}] ${scope}${error.message}`);
    }
  }

  return {
    to: recipient,
    subject: `[isobuild] ${mode} ${status}: ${outcome.label ?? outcome.outputPath}`,
    text: lines.join("\n"),
  };
}

/**
 * Sends the run's outcome once. Delivery problems are logged and returned,
 * never thrown: the build result is settled before this runs.
 */
export async function dispatchNotification(
  outcome: BuildOutcome,
  recipient: string,
  notifier: Notifier,
  logger: NotificationLogger
): Promise<NotificationError | null> {
  try {
    await notifier.send(composeNotification(outcome, recipient));
  } catch (err) {
    const error = new NotificationError(
      `Failed to send notification to ${recipient}: ${errorMessage(err)}`,
      { cause: err }
    );
    logger.warn(error.message);
    return error;
  }
  logger.info(`Notification sent to ${recipient}.`);
  return null;
}
