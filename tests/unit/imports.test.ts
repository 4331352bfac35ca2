import { describe, it, expect } from 'vitest';
import { importJobs, importTimeEntries } from '@/services/imports.service';
import { PermissionDeniedError } from '@/lib/errors';
import { createJob, createPlatform, createTimeEntry, managerActor, technicianActor } from '../helpers/fixtures';
import { createTestContext } from '../helpers/memoryStore';

function setup() {
  return createTestContext({
    platforms: [createPlatform()],
    jobs: [createJob({ id: 'job-1', ticket_number: 'T-1001', external_url: 'https://fn.example/jobs/1' })],
    timeEntries: [createTimeEntry({ id: 'e1', job_id: 'job-1', date_worked: '2026-01-05', hours_worked: 8 })],
  });
}

describe('imports.service', () => {
  describe('importJobs', () => {
    const newJob = {
      platform_id: 'platform-fn',
      description: 'Replace POS terminal',
      ticket_number: 'T-2001',
      external_url: 'https://fn.example/jobs/2',
      billing_amount: 25000,
    };

    it('should create new jobs and skip ones already imported', async () => {
      const { ctx, audit } = setup();

      const result = await importJobs(ctx, managerActor, [
        newJob,
        { platform_id: 'platform-fn', description: 'Same URL', external_url: 'https://fn.example/jobs/1' },
        { platform_id: 'platform-fn', description: 'Same ticket', ticket_number: 'T-1001' },
        { platform_id: 'platform-fn' },
        { platform_id: 'platform-x', description: 'Unknown platform' },
        newJob,
      ]);

      expect(result.created).toHaveLength(1);
      expect(result.created[0]).toEqual(
        expect.objectContaining({
          id: 'job-new-1',
          billing_type: 'flat_rate',
          billing_amount: 25000,
          expenses: 0,
          job_status: 'pending',
        })
      );
      expect(result.skipped).toEqual([
        { index: 1, existingId: 'job-1', reason: 'external_url already imported' },
        { index: 2, existingId: 'job-1', reason: 'ticket_number already imported' },
        { index: 5, existingId: 'job-new-1', reason: 'external_url already imported' },
      ]);
      expect(result.errors.map(e => [e.index, e.code])).toEqual([
        [3, 'VALIDATION_FAILED'],
        [4, 'NOT_FOUND'],
      ]);
      expect(audit.events).toEqual([
        expect.objectContaining({ action: 'jobs_imported', after: { created: 1, skipped: 3, failed: 2 } }),
      ]);
    });

    it('should be restricted to managers and admins', async () => {
      const { ctx } = setup();

      await expect(importJobs(ctx, technicianActor('tech-a'), [newJob])).rejects.toThrow(PermissionDeniedError);
    });
  });

  describe('importTimeEntries', () => {
    it('should create unassigned drafts and skip duplicates', async () => {
      const { ctx } = setup();
      const morning = { job_id: 'job-1', date_worked: '2026-01-05', time_in: '08:00', time_out: '12:00' };

      const result = await importTimeEntries(ctx, managerActor, [
        { job_id: 'job-1', date_worked: '2026-01-05', hours_worked: 8 },
        morning,
        morning,
        { job_id: 'job-x', date_worked: '2026-01-05', hours_worked: 2 },
        { job_id: 'job-1', date_worked: 'yesterday' },
      ]);

      expect(result.created).toHaveLength(1);
      expect(result.created[0]).toEqual(
        expect.objectContaining({
          id: 'entry-new-1',
          technician_id: null,
          hours_worked: 4,
          status: 'draft',
          created_by: 'user-manager',
        })
      );
      expect(result.skipped.map(s => [s.index, s.existingId])).toEqual([
        [0, 'e1'],
        [2, 'entry-new-1'],
      ]);
      expect(result.errors.map(e => [e.index, e.code])).toEqual([
        [3, 'NOT_FOUND'],
        [4, 'VALIDATION_FAILED'],
      ]);
    });
  });
});
