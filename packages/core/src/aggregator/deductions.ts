import { Decimal } from 'decimal.js';
import type { AggregatedRow, CompactedLineItem, DeductionBucket } from '../types/index.js';
import { DEDUCTION_BUCKETS, DEDUCTION_BOUNDS, NO_CUSTOMER } from '../types/index.js';
import { EmptyInputError } from '../errors.js';
import { formatAmount } from '../parser/amount.js';

/**
 * Classify an amount into its deduction bucket by absolute value.
 * Bounds are right-closed, so 30 is 'under 30' and 50 is '30 - 50'. Zero is 'under 30'.
 */
export function classifyDeduction(amount: Decimal.Value): DeductionBucket {
    const abs = new Decimal(amount).abs();
    if (abs.lte(DEDUCTION_BOUNDS.SMALL_MAX)) return 'under 30';
    if (abs.lte(DEDUCTION_BOUNDS.MEDIUM_MAX)) return '30 - 50';
    return 'over 50';
}

type GroupKey = Pick<
    AggregatedRow,
    'company_code' | 'gl_account' | 'year' | 'period' | 'customer_number' | 'currency'
>;

interface BucketTotals {
    count: number;
    total: Decimal;
}

interface Group {
    key: GroupKey;
    buckets: Map<DeductionBucket, BucketTotals>;
}

function groupKeyOf(item: CompactedLineItem): GroupKey {
    return {
        company_code: item.company_code,
        gl_account: item.gl_account,
        year: item.year,
        period: item.period,
        customer_number: item.customer_number ?? NO_CUSTOMER,
        currency: item.currency,
    };
}

function serializeKey(key: GroupKey): string {
    return JSON.stringify([
        key.company_code,
        key.gl_account,
        key.year,
        key.period,
        key.customer_number,
        key.currency,
    ]);
}

/**
 * Aggregate line items into deduction counts and totals.
 *
 * Every grouping key yields exactly one row per deduction bucket, buckets
 * without postings carry zero count and total. Totals sum signed amounts.
 * Missing customer numbers are grouped as 0.
 *
 * Rows come out in order of first appearance of their key, buckets in label order.
 *
 * @param items - Compacted line items
 * @returns Dense list of aggregated rows
 * @throws EmptyInputError when there are no line items
 */
export function aggregateDeductions(items: CompactedLineItem[]): AggregatedRow[] {
    if (items.length === 0) {
        throw new EmptyInputError('Input data contains no records');
    }

    const groups = new Map<string, Group>();

    for (const item of items) {
        const key = groupKeyOf(item);
        const id = serializeKey(key);

        let group = groups.get(id);
        if (!group) {
            group = {
                key,
                buckets: new Map(
                    DEDUCTION_BUCKETS.map((b): [DeductionBucket, BucketTotals] => [b, { count: 0, total: new Decimal(0) }])
                ),
            };
            groups.set(id, group);
        }

        const amount = new Decimal(item.local_amount);
        const bucket = group.buckets.get(classifyDeduction(amount));
        if (bucket) {
            bucket.count++;
            bucket.total = bucket.total.plus(amount);
        }
    }

    const rows: AggregatedRow[] = [];

    for (const { key, buckets } of groups.values()) {
        for (const deduction of DEDUCTION_BUCKETS) {
            const totals = buckets.get(deduction) ?? { count: 0, total: new Decimal(0) };
            rows.push({
                ...key,
                deduction,
                deductions_count: totals.count,
                deductions_total: formatAmount(totals.total),
            });
        }
    }

    return rows;
}
