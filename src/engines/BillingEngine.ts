import {
  compareAsc,
  differenceInCalendarMonths,
  eachMonthOfInterval,
  endOfDay,
  isAfter,
  isSameMonth,
  max,
  min,
  parseISO,
} from 'date-fns';
import { createCall } from '../calls/Call';
import { ContractFactory } from '../contracts/ContractFactory';
import { FixedTermPlan } from '../contracts/FixedTermPlan';
import { PrepaidPlan } from '../contracts/PrepaidPlan';
import { PhoneLine } from '../lines/PhoneLine';
import { CallRecord, EngineResult, LineResult, LineSpec, UsageDataset } from '../types';

interface TrackedLine {
  spec: LineSpec;
  line: PhoneLine;
  start: Date;
  cancelledOn: Date | null;
  amountDue?: number;
}

export class BillingEngine {
  constructor(private contractFactory: ContractFactory = new ContractFactory()) {}

  /**
   * Replay a validated dataset month by month.
   *
   * Every started, still-active line is opened for each month in the range,
   * that month's calls are billed in time order, and lines cancelled during
   * the month are closed after its calls.
   */
  run(dataset: UsageDataset): EngineResult {
    const tracked = new Map<string, TrackedLine>();
    for (const spec of dataset.lines) {
      tracked.set(spec.number, {
        spec,
        line: new PhoneLine(spec.number, this.contractFactory.create(spec.contract)),
        start: parseISO(spec.contract.start),
        cancelledOn: spec.cancelled_on ? parseISO(spec.cancelled_on) : null,
      });
    }

    const calls = dataset.calls
      .map(call =>
        createCall({
          source: call.source,
          destination: call.destination,
          time: call.time,
          durationSeconds: call.duration_seconds,
        })
      )
      .sort((a, b) => compareAsc(a.time, b.time));

    const lines = Array.from(tracked.values());
    const boundaries = [
      ...lines.map(entry => entry.start),
      ...lines.flatMap(entry => (entry.cancelledOn ? [entry.cancelledOn] : [])),
      ...calls.map(call => call.time),
    ];
    const first = min(boundaries);
    const last = max(boundaries);

    let billed = 0;
    let skipped = 0;

    for (const monthStart of eachMonthOfInterval({ start: first, end: last })) {
      const month = monthStart.getMonth() + 1;
      const year = monthStart.getFullYear();
      console.log(`📆 Billing ${year}-${String(month).padStart(2, '0')}`);

      for (const entry of lines) {
        if (entry.line.isActive && differenceInCalendarMonths(monthStart, entry.start) >= 0) {
          entry.line.newMonth(month, year);
        }
      }

      for (const call of calls.filter(c => isSameMonth(c.time, monthStart))) {
        const entry = tracked.get(call.source);
        if (!entry || !this.acceptsCall(entry, call)) {
          console.warn(`⚠️  Skipping call from ${call.source} at ${call.time.toISOString()}: line not in service`);
          skipped++;
          continue;
        }
        entry.line.makeCall(call);
        billed++;
      }

      for (const entry of lines) {
        if (entry.cancelledOn && entry.line.isActive && isSameMonth(entry.cancelledOn, monthStart)) {
          entry.amountDue = entry.line.cancelLine();
          console.log(`🛑 Cancelled ${entry.spec.number}: $${entry.amountDue.toFixed(2)} due`);
        }
      }
    }

    return {
      first_month: { month: first.getMonth() + 1, year: first.getFullYear() },
      last_month: { month: last.getMonth() + 1, year: last.getFullYear() },
      lines: lines.map(entry => this.toLineResult(entry)),
      calls_billed: billed,
      calls_skipped: skipped,
    };
  }

  private acceptsCall(entry: TrackedLine, call: CallRecord): boolean {
    if (!entry.line.isActive || differenceInCalendarMonths(call.time, entry.start) < 0) {
      return false;
    }
    return !(entry.cancelledOn && isAfter(call.time, endOfDay(entry.cancelledOn)));
  }

  private toLineResult(entry: TrackedLine): LineResult {
    const { contract } = entry.line;
    return {
      number: entry.spec.number,
      contract_type: contract.type,
      bills: entry.line.getMonthlyHistory(),
      cancelled_on: entry.spec.cancelled_on,
      amount_due_on_cancel: entry.amountDue,
      deposit_released: contract instanceof FixedTermPlan ? contract.depositReleased : undefined,
      top_ups_charged: contract instanceof PrepaidPlan ? contract.topUpsCharged : undefined,
    };
  }
}
