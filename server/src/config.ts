import dotenv from 'dotenv';

dotenv.config();

export interface SmtpConfig {
  host?: string;
  port: number;
  username?: string;
  password?: string;
}

export interface Config {
  port: number;
  dataFile: string;
  jwtSecret: string;
  reportTitle?: string;
  emailFrom?: string;
  emailTos: string;
  smtp: SmtpConfig;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return {
    port: parseInt(env.PORT || '3001'),
    dataFile: env.DATA_FILE || 'data.json',
    jwtSecret: env.JWT_SECRET || 'dev-secret-change-in-production',
    reportTitle: env.REPORT_TITLE,
    emailFrom: env.EMAIL_FROM,
    emailTos: env.EMAIL_TOS || '',
    smtp: {
      host: env.SMTP_SERVER,
      port: parseInt(env.SMTP_SERVER_PORT || '25'),
      username: env.SMTP_USERNAME,
      password: env.SMTP_PASSWORD,
    },
  };
}
