import type { EconomicField, EconomicFields } from '../types/index.js';

const AMOUNT = String.raw`(?:US\s?)?[$€£]\s?\d[\d,]*(?:\.\d+)?`;

/**
 * Patterns per field, tried in order; the first match wins.
 * A pattern's first capture group is the value, or the whole match when it has none.
 * Field order here is also the order of `targetSchema` in generated records.
 */
const FIELD_PATTERNS: Array<[EconomicField, RegExp[]]> = [
    ['treatment', [
        // Sentence-initial intervention followed by an outcome verb: "Drug X reduced ..."
        /^(?:(?:The|Adding|Switching to)\s+)?([A-Z][\w-]*(?:\s+[A-Z0-9][\w-]*){0,3})\s+(?:reduced|improved|increased|decreased|lowered|saved|dominated|yielded|resulted|was|is|were|provided|generated)\b/,
        /\b(?:[Tt]reatment with|[Aa]dding|[Ii]ntroduction of|[Uu]se of)\s+([A-Za-z][\w-]*(?:\s+[A-Z0-9][\w-]*)?)/,
    ]],
    ['comparator', [
        /\b(?:compared (?:with|to)|versus|vs\.?)\s+([A-Za-z][\w-]*(?:\s+[A-Z0-9][\w-]*)?)/,
    ]],
    ['cost', [
        new RegExp(`${AMOUNT}(?:\\s?(?:million|billion|thousand|[kKmMbB])\\b)?`),
        /\b(?:USD|EUR|GBP)\s?\d[\d,]*(?:\.\d+)?/,
    ]],
    ['qaly', [
        /(\d+(?:\.\d+)?)\s+(?:incremental\s+)?QALYs?\b/,
        /(?<!per\s)\bQALYs?\b[^.;\d$€£]*?(\d+(?:\.\d+)?)(?![\d,])/,
    ]],
    ['icer', [
        new RegExp(`\\b(?:ICER|incremental cost-effectiveness ratio)\\b[^$€£]*?(${AMOUNT})`, 'i'),
        new RegExp(`(${AMOUNT})\\s*(?:per|/)\\s*QALY`, 'i'),
    ]],
    ['perspective', [
        /\bfrom (?:the|a|an)\s+([\w\s'-]+?)\s+perspective\b/i,
    ]],
    ['timeHorizon', [
        /\b(?:time horizon of|over(?: a| an)?)\s+(\d+[\s-](?:years?|months?|weeks?|days?))\b/i,
        /\b(lifetime)\s+(?:time\s+)?horizon\b/i,
    ]],
];

export const ECONOMIC_FIELD_ORDER: EconomicField[] = FIELD_PATTERNS.map(([field]) => field);

/**
 * Pull the health-economic quantities a sentence states.
 * Deterministic: same text, same fields.
 */
export function extractEconomicFields(text: string): EconomicFields {
    const fields: EconomicFields = {};

    for (const [field, patterns] of FIELD_PATTERNS) {
        for (const pattern of patterns) {
            const match = pattern.exec(text);
            if (!match) continue;

            const value = (match[1] ?? match[0]).trim();
            if (value) {
                fields[field] = value;
                break;
            }
        }
    }

    return fields;
}

/**
 * Fields present in `fields`, in schema order.
 */
export function schemaOf(fields: EconomicFields): EconomicField[] {
    return ECONOMIC_FIELD_ORDER.filter((field) => fields[field] !== undefined);
}

/**
 * Merge the fields of several sentences; earlier sentences win on conflicts.
 */
export function mergeFields(all: EconomicFields[]): EconomicFields {
    const merged: EconomicFields = {};
    for (const fields of all) {
        for (const field of schemaOf(fields)) {
            if (merged[field] === undefined) merged[field] = fields[field];
        }
    }
    return merged;
}
