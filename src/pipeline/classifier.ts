import type { CanonicalRecord, ClassifiedRecord, DisciplineRules } from '../types/index.js';

/**
 * Discipline label for one record. The first rule whose keyword occurs in
 * the topic text, or whose field list contains the raw field, wins; then
 * the field label map; then the default label.
 */
export function classifyRecord(record: Pick<CanonicalRecord, 'topics' | 'field'>, rules: DisciplineRules): string {
    const topicText = record.topics.join('; ').toLowerCase();

    for (const rule of rules.rules) {
        if (rule.keywords.some((keyword) => topicText.includes(keyword.toLowerCase()))) {
            return rule.label;
        }
        if (record.field && rule.fields?.includes(record.field)) {
            return rule.label;
        }
    }

    if (Object.hasOwn(rules.fieldLabels, record.field)) {
        return rules.fieldLabels[record.field] ?? rules.defaultLabel;
    }

    return rules.defaultLabel;
}

/**
 * Return new records with `discipline` assigned.
 */
export function classifyRecords(records: CanonicalRecord[], rules: DisciplineRules): ClassifiedRecord[] {
    return records.map((record) => ({ ...record, discipline: classifyRecord(record, rules) }));
}
