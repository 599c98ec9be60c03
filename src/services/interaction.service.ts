import { KnowledgeStore } from './knowledge.service';
import { createError } from '../middleware/error.middleware';
import { InteractionRecord, InteractionSeverity } from '../types/knowledge.types';

const SEVERITY_ORDER: Record<InteractionSeverity, number> = {
  Contraindicated: 0,
  Major: 1,
  Moderate: 2,
  Minor: 3,
};

const isStringArray = (value: unknown): value is string[] =>
  Array.isArray(value) && value.every((item) => typeof item === 'string');

const overlaps = (a: string, b: string): boolean => a.includes(b) || b.includes(a);

/**
 * Looks medications up in the interaction table. Matching is two-way
 * substring containment on the primary or partner name, so it reports
 * more than an exact lookup would: "warfarin" alone surfaces every
 * warfarin interaction. Each table record is reported at most once.
 */
export class InteractionService {
  constructor(private readonly store: KnowledgeStore) {}

  checkInteractions(medications: unknown): InteractionRecord[] {
    if (!isStringArray(medications)) {
      throw createError('Invalid input: medications must be an array of strings', 400);
    }

    // An empty name is a substring of every name
    const names = medications.map((m) => m.trim().toLowerCase()).filter((m) => m.length > 0);
    if (names.length === 0) {
      return [];
    }

    const found: InteractionRecord[] = [];

    for (const [primary, records] of Object.entries(this.store.getInteractionTable())) {
      const primaryName = primary.trim().toLowerCase();
      if (primaryName.length === 0) {
        continue;
      }
      for (const record of records) {
        const partnerName = record.drugs[1].toLowerCase();
        if (names.some((name) => overlaps(name, primaryName) || overlaps(name, partnerName))) {
          found.push(record);
        }
      }
    }

    return found.sort((a, b) => SEVERITY_ORDER[a.severity] - SEVERITY_ORDER[b.severity]);
  }
}
