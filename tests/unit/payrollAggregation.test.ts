import { describe, it, expect, afterEach, vi } from 'vitest';
import { calculateJobPay } from '@/utils/jobPayCalculations';
import {
  buildJobBillingReport,
  buildPayrollReport,
  buildTechnicianHoursReport,
  effectiveJobDate,
  formatDateDisplay,
  isDateInRange,
} from '@/utils/payrollAggregation';
import { createJob, createMileageRate, createTechnician, createTimeEntry } from '../helpers/fixtures';

describe('payrollAggregation', () => {
  describe('formatDateDisplay', () => {
    it('should show a single date once', () => {
      expect(formatDateDisplay(['2026-01-05', '2026-01-05'])).toBe('2026-01-05');
    });

    it('should show the first and last date of a span', () => {
      expect(formatDateDisplay(['2026-01-07', '2026-01-05', '2026-01-06'])).toBe('2026-01-05 - 2026-01-07');
    });

    it('should return an empty string for no dates', () => {
      expect(formatDateDisplay([])).toBe('');
    });
  });

  it('should include both ends of a date range', () => {
    expect(isDateInRange('2026-01-01', '2026-01-01', '2026-01-15')).toBe(true);
    expect(isDateInRange('2026-01-15', '2026-01-01', '2026-01-15')).toBe(true);
    expect(isDateInRange('2026-01-16', '2026-01-01', '2026-01-15')).toBe(false);
  });

  it('should prefer job_date over the creation date', () => {
    expect(effectiveJobDate(createJob({ job_date: '2026-01-09' }))).toBe('2026-01-09');
  });

  describe('creation date fallback', () => {
    afterEach(() => {
      vi.unstubAllEnvs();
    });

    it('should use the UTC creation day regardless of the host timezone', () => {
      vi.stubEnv('TZ', 'America/Los_Angeles');
      const job = createJob({ job_date: null, created_at: '2026-01-05T03:00:00.000Z' });

      expect(effectiveJobDate(job)).toBe('2026-01-05');
      expect(effectiveJobDate({ ...job, created_at: '2026-01-05T03:00:00+00:00' })).toBe('2026-01-05');
    });

    it('should keep a job created late in the UTC day in the billing report', () => {
      vi.stubEnv('TZ', 'America/Los_Angeles');
      const job = createJob({ job_date: null, created_at: '2026-01-05T03:00:00.000Z' });

      const report = buildJobBillingReport({ fromDate: '2026-01-05', toDate: '2026-01-05', jobs: [job], entries: [] });

      expect(report.jobs.map(j => [j.jobId, j.jobDate])).toEqual([['job-1', '2026-01-05']]);
    });
  });

  it('should order job hour groups by ticket rather than first date worked', () => {
    const report = buildTechnicianHoursReport({
      technicianId: 'tech-a',
      fromDate: '2026-01-01',
      toDate: '2026-01-31',
      groupBy: 'job',
      entries: [
        createTimeEntry({ id: 'e1', job_id: 'job-b', date_worked: '2026-01-02', hours_worked: 3 }),
        createTimeEntry({ id: 'e2', job_id: 'job-a', date_worked: '2026-01-04', hours_worked: 5 }),
      ],
      jobs: [createJob({ id: 'job-a', ticket_number: 'T-100' }), createJob({ id: 'job-b', ticket_number: 'T-200' })],
    });

    expect(report.groups.map(g => [g.label, g.hours])).toEqual([
      ['T-100', 5],
      ['T-200', 3],
    ]);
  });

  describe('buildPayrollReport', () => {
    const technicians = [
      createTechnician({ id: 'tech-a', name: 'Zoe Park', hourly_rate: 0 }),
      createTechnician({ id: 'tech-b', name: 'Avery Moss', hourly_rate: 0 }),
    ];
    const rates = [createMileageRate()];

    const job1 = createJob({ id: 'job-1', billing_amount: 40000, expenses: 0 });
    const job2 = createJob({ id: 'job-2', billing_amount: 20000, expenses: 0 });
    const entries = [
      createTimeEntry({ id: 'e1', job_id: 'job-1', technician_id: 'tech-a', date_worked: '2026-01-07', hours_worked: 4 }),
      createTimeEntry({ id: 'e2', job_id: 'job-1', technician_id: 'tech-a', date_worked: '2026-01-08', hours_worked: 4 }),
      createTimeEntry({ id: 'e3', job_id: 'job-2', technician_id: 'tech-a', date_worked: '2026-01-05', hours_worked: 2 }),
      createTimeEntry({ id: 'e4', job_id: 'job-2', technician_id: 'tech-b', date_worked: '2026-01-05', hours_worked: 2 }),
    ];
    const calculations = [job1, job2].map(job =>
      calculateJobPay({ job, entries, technicians, mileageRates: rates })
    );

    it('should sort rows by first date and show multi-day spans', () => {
      const report = buildPayrollReport({
        fromDate: '2026-01-01',
        toDate: '2026-01-31',
        jobs: [job1, job2],
        calculations,
        entriesInRange: entries,
      });

      const zoe = report.technicians.find(t => t.technicianId === 'tech-a');
      expect(zoe?.rows.map(r => [r.jobId, r.dateDisplay])).toEqual([
        ['job-2', '2026-01-05'],
        ['job-1', '2026-01-07 - 2026-01-08'],
      ]);
    });

    it('should sort technicians by name and reconcile totals', () => {
      const report = buildPayrollReport({
        fromDate: '2026-01-01',
        toDate: '2026-01-31',
        jobs: [job1, job2],
        calculations,
        entriesInRange: entries,
      });

      expect(report.technicians.map(t => t.technicianName)).toEqual(['Avery Moss', 'Zoe Park']);
      // job-1: 20000 pool to Zoe; job-2: 10000 pool split 5000/5000
      expect(report.technicians.map(t => t.totals.basePay)).toEqual([5000, 25000]);
      expect(report.grandTotals.basePay).toBe(30000);
      expect(report.grandTotals.profitShare).toBe(30000);
    });

    it('should only list technicians who worked inside the range', () => {
      const report = buildPayrollReport({
        fromDate: '2026-01-06',
        toDate: '2026-01-31',
        jobs: [job1, job2],
        calculations,
        entriesInRange: entries,
      });

      expect(report.technicians.map(t => t.technicianId)).toEqual(['tech-a']);
      expect(report.technicians[0].rows.map(r => r.jobId)).toEqual(['job-1']);
    });
  });
});
