import pool from '../db/connection';
import { createReportModel, ReportModel } from '../lib/report';

export interface ReportRun {
  id: string;
  generated_at: Date;
  source: string;
  report: ReportModel;
  created_at: Date;
}

interface ReportRunRow {
  id: string;
  generated_at: Date;
  source: string;
  report: unknown;
  created_at: Date;
}

// Stored reports go back through the closed-key check.
function toReportRun(row: ReportRunRow): ReportRun {
  return { ...row, report: createReportModel(row.report) };
}

export async function saveReportRun(report: ReportModel, source: string, generatedAt: Date): Promise<ReportRun> {
  const result = await pool.query<ReportRunRow>(
    `INSERT INTO report_runs (generated_at, source, report)
     VALUES ($1, $2, $3)
     RETURNING id, generated_at, source, report, created_at`,
    [generatedAt, source, JSON.stringify(report)]
  );
  return toReportRun(result.rows[0]);
}

export async function listReportRuns(limit = 20): Promise<ReportRun[]> {
  const result = await pool.query<ReportRunRow>(
    `SELECT id, generated_at, source, report, created_at
     FROM report_runs
     ORDER BY generated_at DESC
     LIMIT $1`,
    [limit]
  );
  return result.rows.map(toReportRun);
}

export async function getReportRun(id: string): Promise<ReportRun | null> {
  const result = await pool.query<ReportRunRow>(
    `SELECT id, generated_at, source, report, created_at
     FROM report_runs
     WHERE id = $1`,
    [id]
  );
  if (result.rows.length === 0) {
    return null;
  }
  return toReportRun(result.rows[0]);
}
