import nodemailer from 'nodemailer';
import { InvalidEmailError } from '../lib/errors';
import { buildReport } from '../lib/report';
import { emailReport, parseEmailList } from '../services/email';
import { loadFixture, REFERENCE_DATE } from './helpers';

describe('parseEmailList', () => {
  it('splits, trims and drops empty entries', () => {
    expect(parseEmailList(' clerk@example.com, ,bishop@example.com,')).toEqual([
      'clerk@example.com',
      'bishop@example.com',
    ]);
  });

  it('returns nothing for an empty list', () => {
    expect(parseEmailList('')).toEqual([]);
  });

  it('rejects an invalid address', () => {
    expect(() => parseEmailList('clerk@example.com, not-an-email')).toThrow(InvalidEmailError);
    expect(() => parseEmailList('not-an-email')).toThrow('Invalid email address: not-an-email');
  });
});

describe('emailReport', () => {
  const report = buildReport(loadFixture(), { referenceDate: REFERENCE_DATE });

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('sends the report as the body and as an attachment', async () => {
    const transport = nodemailer.createTransport({ jsonTransport: true });

    const info = await emailReport(transport, {
      to: ['bishop@example.com', 'clerk@example.com'],
      from: 'reports@example.com',
      report,
      generatedAt: REFERENCE_DATE,
    });

    expect(info.envelope).toEqual({
      from: 'reports@example.com',
      to: ['bishop@example.com', 'clerk@example.com'],
    });

    const message = JSON.parse(info.message);
    expect(message.subject).toBe('Ward Membership Report 2024-06-15');
    expect(message.text.split('\n')).toContain('    Brethren: 10 (77%)');
    expect(message.attachments).toHaveLength(1);
    expect(message.attachments[0].filename).toBe('ward-report-2024-06-15.txt');
  });

  it('uses the report title in the subject', async () => {
    const transport = nodemailer.createTransport({ jsonTransport: true });
    const info = await emailReport(transport, {
      to: ['bishop@example.com'],
      from: 'reports@example.com',
      report,
      generatedAt: REFERENCE_DATE,
      title: 'Maple Grove Ward',
    });
    expect(JSON.parse(info.message).subject).toBe('Maple Grove Ward 2024-06-15');
  });
});
