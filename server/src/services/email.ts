import nodemailer, { Transporter } from 'nodemailer';
import { z } from 'zod';
import { SmtpConfig } from '../config';
import { InvalidEmailError } from '../lib/errors';
import { ReportModel } from '../lib/report';
import { formatDate, renderReport, reportFileName } from '../lib/render';

const emailSchema = z.string().email();

/**
 * Split a comma-separated address list. Every address is checked before
 * anything is sent.
 */
export function parseEmailList(value: string): string[] {
  const addresses = value
    .split(',')
    .map((address) => address.trim())
    .filter((address) => address.length > 0);

  for (const address of addresses) {
    if (!emailSchema.safeParse(address).success) {
      throw new InvalidEmailError(address);
    }
  }
  return addresses;
}

export function createMailTransport(smtp: SmtpConfig): Transporter {
  return nodemailer.createTransport({
    host: smtp.host,
    port: smtp.port,
    auth: smtp.username ? { user: smtp.username, pass: smtp.password } : undefined,
  });
}

export interface EmailReportOptions {
  to: string[];
  from: string;
  report: ReportModel;
  generatedAt: Date;
  title?: string;
}

/** Send the rendered report as the message body and as a text attachment. */
export async function emailReport<T>(transport: Transporter<T>, options: EmailReportOptions): Promise<T> {
  const text = renderReport(options.report, { title: options.title, generatedAt: options.generatedAt });
  const subject = `${options.title ?? 'Ward Membership Report'} ${formatDate(options.generatedAt)}`;

  const info = await transport.sendMail({
    from: options.from,
    to: options.to,
    subject,
    text,
    attachments: [
      {
        filename: reportFileName(options.generatedAt),
        content: text,
        contentType: 'text/plain',
      },
    ],
  });

  console.log(`Report emailed to ${options.to.join(', ')}`);
  return info;
}
