import { readFileSync } from 'node:fs';
import { z } from 'zod';

const keywordCategories = z.array(z.object({
    label: z.string().min(1),
    keywords: z.array(z.string().min(1)),
}));

const referenceSchema = z.object({
    bgs: z.object({
        critical: z.array(z.string().min(1)),
        categories: keywordCategories,
    }),
    comtrade: z.object({
        minerals: z.array(z.object({
            id: z.string().min(1),
            name: z.string().min(1),
            hsCodes: z.array(z.string().regex(/^\d{2,6}$/)).min(1),
        })),
        majorEconomies: z.array(z.string().regex(/^\d+$/)),
    }),
    edx: z.object({
        categories: keywordCategories,
    }),
    cmm: z.object({
        /** First term found in a query picks the BGS commodity searched for it */
        bgsCommodities: z.array(z.object({
            term: z.string().min(1),
            commodity: z.string().min(1),
        })),
    }),
});

export type ReferenceData = z.infer<typeof referenceSchema>;
export type ComtradeMineral = ReferenceData['comtrade']['minerals'][number];

let cached: ReferenceData | null = null;

/**
 * Static critical-mineral tables shipped with the package.
 */
export function getReferenceData(): ReferenceData {
    if (!cached) {
        const raw = readFileSync(new URL('./critical-minerals.json', import.meta.url), 'utf-8');
        cached = referenceSchema.parse(JSON.parse(raw));
    }
    return cached;
}
