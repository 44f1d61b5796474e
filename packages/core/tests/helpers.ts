import type { LineItem, CompactedLineItem } from '@gl-deductions/shared';

// Helper to create a minimal LineItem
export function makeItem(overrides: Partial<LineItem> = {}): LineItem {
    return {
        currency: 'EUR',
        company_code: '0075',
        gl_account: 66010030,
        year: 2026,
        period: 9,
        document_type: 'DZ',
        offsetting_account: 555000,
        offsetting_account_type: 'D',
        local_amount: '-10',
        text: '',
        ...overrides,
    };
}

export function makeCompacted(overrides: Partial<CompactedLineItem> = {}): CompactedLineItem {
    return {
        ...makeItem(),
        customer_number: 4000001,
        ...overrides,
    };
}

/**
 * Small seeded PRNG so generated tables are identical on every run.
 */
export function seededRandom(seed: number): () => number {
    let state = seed >>> 0;
    return () => {
        state = (state + 0x6d2b79f5) >>> 0;
        let t = state;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
}

export function pick<T>(random: () => number, values: readonly T[]): T {
    return values[Math.floor(random() * values.length)];
}

/**
 * Random compacted line items over a small key space, so keys repeat.
 */
export function randomCompactedTable(random: () => number, size: number): CompactedLineItem[] {
    const items: CompactedLineItem[] = [];
    for (let i = 0; i < size; i++) {
        const cents = Math.floor(random() * 20000) - 10000;
        items.push(makeCompacted({
            company_code: pick(random, ['0075', '0080', '0112']),
            gl_account: pick(random, [66010030, 66010040]),
            period: pick(random, [8, 9]),
            currency: pick(random, ['EUR', 'CZK']),
            customer_number: pick(random, [null, 4000001, 4000002, 1000001, 555000]),
            local_amount: (cents / 100).toFixed(2),
        }));
    }
    return items;
}
