import express, { Response } from 'express';
import { Transporter } from 'nodemailer';
import { z } from 'zod';
import { Config } from '../config';
import { InvalidEmailError, RecordValidationError, UnclassifiedItemError } from '../lib/errors';
import { renderReport } from '../lib/render';
import { generateReport } from '../services/currentReport';
import { emailReport, parseEmailList } from '../services/email';
import { getReportRun, listReportRuns, saveReportRun } from '../services/reportRuns';

export interface ReportsRouterDeps {
  config: Config;
  mailer: Transporter;
}

// Unusable snapshot data answers 422; anything else is a server fault.
function sendReportError(res: Response, error: unknown, message: string) {
  if (error instanceof RecordValidationError || error instanceof UnclassifiedItemError) {
    return res.status(422).json({ error: error.message });
  }
  console.error(`${message}:`, error);
  return res.status(500).json({ error: message });
}

const emailBodySchema = z.object({ emails: z.string() });

export function createReportsRouter({ config, mailer }: ReportsRouterDeps) {
  const router = express.Router();

  /**
   * GET /api/reports/current
   * Aggregate the configured snapshot
   */
  router.get('/current', async (_req, res) => {
    try {
      const { report, generatedAt } = await generateReport(config.dataFile);
      res.json({ generated_at: generatedAt.toISOString(), report });
    } catch (error) {
      sendReportError(res, error, 'Failed to generate report');
    }
  });

  /**
   * GET /api/reports/current/text
   * The same report rendered as plain text
   */
  router.get('/current/text', async (_req, res) => {
    try {
      const { report, generatedAt } = await generateReport(config.dataFile);
      res.type('text/plain').send(renderReport(report, { title: config.reportTitle, generatedAt }));
    } catch (error) {
      sendReportError(res, error, 'Failed to render report');
    }
  });

  /**
   * POST /api/reports/current/email
   * Email the report to a comma-separated list of addresses
   */
  router.post('/current/email', async (req, res) => {
    const body = emailBodySchema.safeParse(req.body);
    if (!body.success) {
      return res.status(400).json({ error: 'emails is required' });
    }

    try {
      const to = parseEmailList(body.data.emails);
      if (to.length === 0) {
        return res.status(400).json({ error: 'At least one email address is required' });
      }
      if (!config.emailFrom) {
        console.error('EMAIL_FROM is not configured');
        return res.status(500).json({ error: 'Email sender is not configured' });
      }

      const { report, generatedAt } = await generateReport(config.dataFile);
      await emailReport(mailer, { to, from: config.emailFrom, report, generatedAt, title: config.reportTitle });
      return res.json({ success: true, recipients: to });
    } catch (error) {
      if (error instanceof InvalidEmailError) {
        return res.status(400).json({ error: error.message });
      }
      return sendReportError(res, error, 'Failed to email report');
    }
  });

  /**
   * POST /api/reports
   * Generate a report and save it to the history
   */
  router.post('/', async (_req, res) => {
    try {
      const { report, generatedAt, source } = await generateReport(config.dataFile);
      const run = await saveReportRun(report, source, generatedAt);
      res.status(201).json(run);
    } catch (error) {
      sendReportError(res, error, 'Failed to save report');
    }
  });

  /**
   * GET /api/reports
   * Saved reports, newest first
   */
  router.get('/', async (req, res) => {
    try {
      const requested = typeof req.query.limit === 'string' ? parseInt(req.query.limit) || 20 : 20;
      const limit = Math.max(1, requested);
      const runs = await listReportRuns(limit);
      res.json(runs);
    } catch (error) {
      console.error('Error fetching report runs:', error);
      res.status(500).json({ error: 'Failed to fetch reports' });
    }
  });

  router.get('/:id', async (req, res) => {
    try {
      const { id } = req.params;
      if (!z.string().uuid().safeParse(id).success) {
        return res.status(404).json({ error: 'Report not found' });
      }
      const run = await getReportRun(id);
      if (!run) {
        return res.status(404).json({ error: 'Report not found' });
      }
      res.json(run);
    } catch (error) {
      console.error('Error fetching report run:', error);
      res.status(500).json({ error: 'Failed to fetch report' });
    }
  });

  return router;
}
