import express from 'express';
import cors from 'cors';
import cookieParser from 'cookie-parser';
import { Transporter } from 'nodemailer';
import { Config, loadConfig } from './config';
import { createRequireAuth } from './middleware/auth';
import { createReportsRouter } from './routes/reports';
import { createMailTransport } from './services/email';

export function createApp(config: Config, mailer: Transporter = createMailTransport(config.smtp)) {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json());
  app.use(cookieParser());

  // Routes
  app.use('/api/reports', createRequireAuth(config.jwtSecret), createReportsRouter({ config, mailer }));

  // Health check
  app.get('/api/health', (req, res) => {
    res.json({ status: 'ok' });
  });

  return app;
}

if (require.main === module) {
  const config = loadConfig();
  createApp(config).listen(config.port, () => {
    console.log(`Server running on port ${config.port}`);
  });
}
