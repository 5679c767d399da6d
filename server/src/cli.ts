#!/usr/bin/env node
import fs from 'fs/promises';
import pool from './db/connection';
import { Config, loadConfig } from './config';
import { createToken } from './middleware/auth';
import { renderReport } from './lib/render';
import { generateReport } from './services/currentReport';
import { createMailTransport, emailReport, parseEmailList } from './services/email';
import { saveReportRun } from './services/reportRuns';

const USAGE = `Usage:
  cli report [--data <file>] [--emails <a@x,b@y>] [--out <file>] [--save]
  cli token <email> [--name <name>]`;

export interface ReportCommand {
  command: 'report';
  data?: string;
  emails?: string;
  out?: string;
  save: boolean;
}

export interface TokenCommand {
  command: 'token';
  email: string;
  name?: string;
}

export type CliCommand = ReportCommand | TokenCommand;

export class UsageError extends Error {
  constructor(message: string) {
    super(`${message}\n${USAGE}`);
    this.name = 'UsageError';
  }
}

function takeValue(args: string[], index: number, flag: string): string {
  const value = args[index + 1];
  if (value === undefined || value.startsWith('-')) {
    throw new UsageError(`${flag} needs a value`);
  }
  return value;
}

export function parseCliArgs(args: string[]): CliCommand {
  const [command = 'report', ...rest] = args;

  if (command === 'report') {
    const parsed: ReportCommand = { command: 'report', save: false };
    for (let i = 0; i < rest.length; i++) {
      const arg = rest[i];
      if (arg === '--data' || arg === '-d') {
        parsed.data = takeValue(rest, i++, arg);
      } else if (arg === '--emails' || arg === '-e') {
        parsed.emails = takeValue(rest, i++, arg);
      } else if (arg === '--out' || arg === '-o') {
        parsed.out = takeValue(rest, i++, arg);
      } else if (arg === '--save') {
        parsed.save = true;
      } else {
        throw new UsageError(`Unknown option ${arg}`);
      }
    }
    return parsed;
  }

  if (command === 'token') {
    const [email, ...options] = rest;
    if (!email || email.startsWith('-')) {
      throw new UsageError('token needs an email');
    }
    const parsed: TokenCommand = { command: 'token', email };
    for (let i = 0; i < options.length; i++) {
      if (options[i] === '--name') {
        parsed.name = takeValue(options, i++, '--name');
      } else {
        throw new UsageError(`Unknown option ${options[i]}`);
      }
    }
    return parsed;
  }

  throw new UsageError(`Unknown command ${command}`);
}

async function runReport(command: ReportCommand, config: Config) {
  const dataFile = command.data ?? config.dataFile;
  // Addresses are checked before any work is done.
  const emailTos = parseEmailList(command.emails ?? config.emailTos);

  // stdout may be the report itself.
  console.error(`Reading ${dataFile}...`);
  const { report, generatedAt, source } = await generateReport(dataFile);
  const text = renderReport(report, { title: config.reportTitle, generatedAt });

  if (command.save) {
    try {
      const run = await saveReportRun(report, source, generatedAt);
      console.log(`Saved report ${run.id}`);
    } finally {
      await pool.end();
    }
  }

  if (command.out) {
    await fs.writeFile(command.out, text, 'utf-8');
    console.log(`Report written to ${command.out}`);
  }

  if (emailTos.length > 0) {
    if (!config.emailFrom) {
      throw new UsageError('EMAIL_FROM must be set to email the report');
    }
    await emailReport(createMailTransport(config.smtp), {
      to: emailTos,
      from: config.emailFrom,
      report,
      generatedAt,
      title: config.reportTitle,
    });
  } else if (!command.out) {
    // Print the report by default.
    console.log(text);
  }
}

export async function main(args: string[], config: Config = loadConfig()): Promise<void> {
  const command = parseCliArgs(args);
  if (command.command === 'token') {
    console.log(createToken({ email: command.email, name: command.name }, config.jwtSecret));
    return;
  }
  await runReport(command, config);
}

if (require.main === module) {
  main(process.argv.slice(2)).catch((error: unknown) => {
    console.error(error instanceof Error ? error.message : error);
    process.exit(1);
  });
}
