import { describe, it, expect } from 'vitest';
import { calculateJobPay, calculateJobNet, TECH_POOL_SHARE } from '@/utils/jobPayCalculations';
import { IncompleteJobDataError } from '@/lib/errors';
import { createJob, createMileageRate, createTechnician, createTimeEntry } from '../helpers/fixtures';

const techA = createTechnician({ id: 'tech-a', name: 'Alex Rivera', hourly_rate: 2000 });
const techB = createTechnician({ id: 'tech-b', name: 'Blair Chen', hourly_rate: 6000 });
const rates = [createMileageRate({ id: 'rate-2025', rate_per_mile: 67, effective_date: '2025-01-01' })];

describe('jobPayCalculations', () => {
  describe('calculateJobNet', () => {
    it('should subtract expenses and commissions from billing', () => {
      expect(calculateJobNet(createJob({ billing_amount: 100000, expenses: 10000, commissions: 2500 }))).toBe(87500);
    });

    it('should throw when billing is missing', () => {
      expect(() => calculateJobNet(createJob({ billing_amount: null }))).toThrow(IncompleteJobDataError);
    });
  });

  describe('single technician', () => {
    it('should give the whole tech pool to one technician (Scenario A)', () => {
      const result = calculateJobPay({
        job: createJob(),
        entries: [createTimeEntry({ hours_worked: 10 })],
        technicians: [techA],
        mileageRates: rates,
      });

      expect(TECH_POOL_SHARE).toBe(0.5);
      expect(result.jobNet).toBe(90000);
      expect(result.techPool).toBe(45000);
      expect(result.totalHours).toBe(10);
      expect(result.technicians).toHaveLength(1);

      const row = result.technicians[0];
      expect(row.calculatedRate).toBe(4500);
      expect(row.effectiveRate).toBe(4500);
      expect(row.weightedBasePay).toBe(45000);
      expect(row.basePay).toBe(45000);
      expect(row.usingMinimum).toBe(false);
      expect(row.profitShare).toBe(45000);
      expect(row.totalPay).toBe(45000);
      expect(result.floorShortfall).toBe(0);
      expect(result.warnings).toEqual([]);
    });

    it('should take hours from clock times when hours_worked is empty', () => {
      const result = calculateJobPay({
        job: createJob(),
        entries: [createTimeEntry({ hours_worked: null, time_in: '22:00', time_out: '02:30' })],
        technicians: [techA],
        mileageRates: rates,
      });

      expect(result.totalHours).toBe(4.5);
      expect(result.technicians[0].hours).toBe(4.5);
      expect(result.technicians[0].calculatedRate).toBe(10000);
      expect(result.technicians[0].basePay).toBe(45000);
    });

    it('should use the configured tech pool share', () => {
      const result = calculateJobPay({
        job: createJob(),
        entries: [createTimeEntry({ hours_worked: 10 })],
        technicians: [techA],
        mileageRates: rates,
        rules: { techPoolShare: 0.6 },
      });

      expect(result.techPool).toBe(54000);
      expect(result.technicians[0].basePay).toBe(54000);
      expect(result.technicians[0].profitShare).toBe(36000);
    });
  });

  describe('multiple technicians', () => {
    const entries = [
      createTimeEntry({ id: 'entry-1', technician_id: 'tech-a', hours_worked: 8 }),
      createTimeEntry({ id: 'entry-2', technician_id: 'tech-b', hours_worked: 2 }),
    ];

    it('should split the pool by hours and floor the low-rate technician (Scenario B)', () => {
      const result = calculateJobPay({ job: createJob(), entries, technicians: [techA, techB], mileageRates: rates });

      const [a, b] = result.technicians;
      expect(a.technicianId).toBe('tech-a');
      expect(a.weightedBasePay).toBe(36000);
      expect(a.calculatedRate).toBe(4500);
      expect(a.basePay).toBe(36000);
      expect(a.usingMinimum).toBe(false);

      expect(b.technicianId).toBe('tech-b');
      expect(b.weightedBasePay).toBe(9000);
      expect(b.calculatedRate).toBe(4500);
      expect(b.basePay).toBe(12000);
      expect(b.effectiveRate).toBe(6000);
      expect(b.usingMinimum).toBe(true);

      expect(result.floorShortfall).toBe(3000);
      expect(result.totals.basePay).toBe(48000);
    });

    it('should split profit share by hours after base pay', () => {
      const result = calculateJobPay({ job: createJob(), entries, technicians: [techA, techB], mileageRates: rates });

      expect(result.technicians.map(t => t.profitShare)).toEqual([33600, 8400]);
      expect(result.totals.profitShare).toBe(result.jobNet - result.totals.basePay);
    });

    it('should never pay a technician less than the proportional split', () => {
      const result = calculateJobPay({ job: createJob(), entries, technicians: [techA, techB], mileageRates: rates });

      for (const row of result.technicians) {
        expect(row.basePay).toBeGreaterThanOrEqual(row.weightedBasePay);
      }
    });

    it('should give the same result regardless of entry order', () => {
      const forward = calculateJobPay({ job: createJob(), entries, technicians: [techA, techB], mileageRates: rates });
      const reversed = calculateJobPay({
        job: createJob(),
        entries: [...entries].reverse(),
        technicians: [techB, techA],
        mileageRates: rates,
      });

      expect(reversed).toEqual(forward);
    });

    it('should be idempotent', () => {
      const input = { job: createJob(), entries, technicians: [techA, techB], mileageRates: rates };
      expect(calculateJobPay(input)).toEqual(calculateJobPay(input));
    });

    it('should reconcile profit share rounding into the first of the largest rows', () => {
      const technicians = ['t1', 't2', 't3'].map(id => createTechnician({ id, name: id, hourly_rate: 0 }));
      const result = calculateJobPay({
        job: createJob({ billing_amount: 20000, expenses: 0 }),
        entries: technicians.map((t, idx) =>
          createTimeEntry({ id: `entry-${idx}`, technician_id: t.id, hours_worked: 1 })
        ),
        technicians,
        mileageRates: rates,
      });

      expect(result.technicians.map(t => t.basePay)).toEqual([3333, 3333, 3333]);
      expect(result.technicians.map(t => t.profitShare)).toEqual([3333, 3334, 3334]);
      expect(result.totals.profitShare).toBe(20000 - 9999);
    });

    it('should keep the weighted split within a cent per technician of the pool', () => {
      const technicians = ['t1', 't2', 't3'].map(id => createTechnician({ id, name: id, hourly_rate: 0 }));
      const result = calculateJobPay({
        job: createJob({ billing_amount: 20001, expenses: 0 }),
        entries: technicians.map((t, idx) =>
          createTimeEntry({ id: `entry-${idx}`, technician_id: t.id, hours_worked: 1 })
        ),
        technicians,
        mileageRates: rates,
      });

      const weighted = result.technicians.reduce((sum, t) => sum + t.weightedBasePay, 0);
      expect(Math.abs(weighted - result.techPool)).toBeLessThanOrEqual(result.technicians.length);
    });
  });

  describe('mileage and reimbursements', () => {
    it('should pay mileage at the rate in force on the work date', () => {
      const result = calculateJobPay({
        job: createJob(),
        entries: [createTimeEntry({ hours_worked: 10, mileage: 100 })],
        technicians: [techA],
        mileageRates: rates,
      });

      expect(result.technicians[0].mileage).toBe(100);
      expect(result.technicians[0].mileagePay).toBe(6700);
      expect(result.technicians[0].totalPay).toBe(51700);
    });

    it('should apply each entry its own historical rate', () => {
      const history = [
        createMileageRate({ id: 'rate-2023', rate_per_mile: 65.5, effective_date: '2023-01-01' }),
        createMileageRate({ id: 'rate-2024', rate_per_mile: 67, effective_date: '2024-01-01' }),
      ];
      const result = calculateJobPay({
        job: createJob(),
        entries: [
          createTimeEntry({ id: 'entry-1', date_worked: '2023-06-01', hours_worked: 5, mileage: 10 }),
          createTimeEntry({ id: 'entry-2', date_worked: '2024-06-01', hours_worked: 5, mileage: 10 }),
        ],
        technicians: [techA],
        mileageRates: history,
      });

      expect(result.technicians[0].mileagePay).toBe(1325);
      expect(result.technicians[0].entryDates).toEqual(['2023-06-01', '2024-06-01']);
    });

    it('should warn and pay no mileage when no rate covers the date', () => {
      const result = calculateJobPay({
        job: createJob(),
        entries: [createTimeEntry({ id: 'entry-old', date_worked: '2024-06-01', hours_worked: 10, mileage: 50 })],
        technicians: [techA],
        mileageRates: rates,
      });

      expect(result.warnings).toEqual([
        expect.objectContaining({ code: 'RATE_NOT_FOUND', entryId: 'entry-old', technicianId: 'tech-a' }),
      ]);
      expect(result.technicians[0].mileagePay).toBe(0);
      expect(result.technicians[0].basePay).toBe(45000);
      expect(result.technicians[0].totalPay).toBe(45000);
    });

    it('should not look up a rate for entries without mileage', () => {
      const result = calculateJobPay({
        job: createJob(),
        entries: [createTimeEntry({ date_worked: '2020-01-01', hours_worked: 10, mileage: 0 })],
        technicians: [techA],
        mileageRates: rates,
      });

      expect(result.warnings).toEqual([]);
    });

    it('should pass per diem and personal expenses through to total pay', () => {
      const result = calculateJobPay({
        job: createJob(),
        entries: [
          createTimeEntry({ id: 'entry-1', hours_worked: 5, per_diem: 2500, personal_expenses: 1234 }),
          createTimeEntry({ id: 'entry-2', hours_worked: 5, per_diem: 2500 }),
        ],
        technicians: [techA],
        mileageRates: rates,
      });

      const row = result.technicians[0];
      expect(row.perDiem).toBe(5000);
      expect(row.personalExpenses).toBe(1234);
      expect(row.totalPay).toBe(45000 + 5000 + 1234);
      expect(row.profitShare).toBe(45000);
      expect(row.entryIds).toEqual(['entry-1', 'entry-2']);
    });
  });

  describe('excluded and incomplete data', () => {
    it('should return an empty result for a cancelled job', () => {
      const result = calculateJobPay({
        job: createJob({ job_status: 'cancelled' }),
        entries: [createTimeEntry()],
        technicians: [techA],
        mileageRates: rates,
      });

      expect(result.technicians).toEqual([]);
      expect(result.totals.totalPay).toBe(0);
      expect(result.warnings.map(w => w.code)).toEqual(['JOB_CANCELLED']);
    });

    it('should throw when the job has no billing amount', () => {
      expect(() =>
        calculateJobPay({
          job: createJob({ billing_amount: null }),
          entries: [createTimeEntry()],
          technicians: [techA],
          mileageRates: rates,
        })
      ).toThrow(IncompleteJobDataError);
    });

    it('should ignore draft and submitted entries', () => {
      const result = calculateJobPay({
        job: createJob(),
        entries: [
          createTimeEntry({ id: 'entry-1', hours_worked: 10, status: 'paid' }),
          createTimeEntry({ id: 'entry-2', technician_id: 'tech-b', hours_worked: 10, status: 'submitted' }),
          createTimeEntry({ id: 'entry-3', technician_id: 'tech-b', hours_worked: 10, status: 'draft' }),
        ],
        technicians: [techA, techB],
        mileageRates: rates,
      });

      expect(result.technicians.map(t => t.technicianId)).toEqual(['tech-a']);
      expect(result.technicians[0].basePay).toBe(45000);
    });

    it('should leave unassigned entries out with a warning', () => {
      const result = calculateJobPay({
        job: createJob(),
        entries: [
          createTimeEntry({ id: 'entry-1', hours_worked: 10 }),
          createTimeEntry({ id: 'entry-2', technician_id: null, hours_worked: 5 }),
        ],
        technicians: [techA],
        mileageRates: rates,
      });

      expect(result.totalHours).toBe(10);
      expect(result.technicians[0].basePay).toBe(45000);
      expect(result.warnings).toEqual([expect.objectContaining({ code: 'UNASSIGNED_ENTRY', entryId: 'entry-2' })]);
    });

    it('should count entries without hours as zero with a warning', () => {
      const result = calculateJobPay({
        job: createJob(),
        entries: [
          createTimeEntry({ id: 'entry-1', hours_worked: 10 }),
          createTimeEntry({ id: 'entry-2', hours_worked: null, time_in: null, time_out: null }),
        ],
        technicians: [techA],
        mileageRates: rates,
      });

      expect(result.totalHours).toBe(10);
      expect(result.warnings).toEqual([expect.objectContaining({ code: 'MISSING_HOURS', entryId: 'entry-2' })]);
    });

    it('should return no rows when total hours are zero', () => {
      const result = calculateJobPay({
        job: createJob(),
        entries: [createTimeEntry({ hours_worked: 0 })],
        technicians: [techA],
        mileageRates: rates,
      });

      expect(result.techPool).toBe(45000);
      expect(result.technicians).toEqual([]);
      expect(result.totals.totalPay).toBe(0);
    });

    it('should name unknown technicians and apply no floor', () => {
      const result = calculateJobPay({
        job: createJob(),
        entries: [createTimeEntry({ technician_id: 'tech-z', hours_worked: 10 })],
        technicians: [techA],
        mileageRates: rates,
      });

      expect(result.technicians[0].technicianName).toBe('Technician tech-z');
      expect(result.technicians[0].minimumRate).toBe(0);
      expect(result.warnings.map(w => w.code)).toEqual(['UNKNOWN_TECHNICIAN']);
    });

    it('should clamp the pool at zero and still honour the floor when the job loses money', () => {
      const result = calculateJobPay({
        job: createJob({ billing_amount: 100000, expenses: 150000 }),
        entries: [createTimeEntry({ hours_worked: 10 })],
        technicians: [techA],
        mileageRates: rates,
      });

      expect(result.jobNet).toBe(-50000);
      expect(result.techPool).toBe(0);
      expect(result.technicians[0].basePay).toBe(20000);
      expect(result.technicians[0].usingMinimum).toBe(true);
      expect(result.technicians[0].profitShare).toBe(-70000);
      expect(result.floorShortfall).toBe(20000);
    });
  });
});
