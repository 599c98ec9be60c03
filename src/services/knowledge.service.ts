import {
  Condition,
  Drug,
  InteractionTable,
  KnowledgeBaseData,
  KnowledgeBaseStats,
  Symptom,
} from '../types/knowledge.types';
import { readKnowledgeBaseFile } from '../config/knowledgeBase';

const deepFreeze = <T>(value: T): T => {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
};

const indexById = <T extends { id: string }>(collection: string, items: readonly T[]): Map<string, T> => {
  const index = new Map<string, T>();
  for (const item of items) {
    if (index.has(item.id)) {
      throw new Error(`Duplicate ${collection} identifier: ${item.id}`);
    }
    index.set(item.id, item);
  }
  return index;
};

/**
 * Read-only view over the seed knowledge base. Built once and shared by
 * every search; the underlying data is frozen on construction.
 */
export class KnowledgeStore {
  private readonly data: KnowledgeBaseData;
  private readonly conditionsById: Map<string, Condition>;
  private readonly drugsById: Map<string, Drug>;
  private readonly symptomsById: Map<string, Symptom>;

  constructor(data: KnowledgeBaseData) {
    this.data = deepFreeze(data);
    this.conditionsById = indexById('condition', data.conditions);
    this.drugsById = indexById('drug', data.drugs);
    this.symptomsById = indexById('symptom', data.symptoms);
  }

  static fromFile(filePath: string): KnowledgeStore {
    const store = new KnowledgeStore(readKnowledgeBaseFile(filePath));
    const stats = store.getStats();
    console.log(
      `📚 Knowledge base loaded: ${stats.conditions} conditions, ${stats.drugs} drugs, ${stats.symptoms} symptoms, ${stats.interactionRecords} interactions`
    );
    return store;
  }

  getConditions(): readonly Condition[] {
    return this.data.conditions;
  }

  getDrugs(): readonly Drug[] {
    return this.data.drugs;
  }

  getSymptoms(): readonly Symptom[] {
    return this.data.symptoms;
  }

  getEmergencyConditionNames(): readonly string[] {
    return this.data.emergencyConditions;
  }

  getInteractionTable(): InteractionTable {
    return this.data.interactions;
  }

  getCondition(id: string): Condition | undefined {
    return this.conditionsById.get(id);
  }

  getDrug(id: string): Drug | undefined {
    return this.drugsById.get(id);
  }

  getSymptom(id: string): Symptom | undefined {
    return this.symptomsById.get(id);
  }

  getStats(): KnowledgeBaseStats {
    return {
      conditions: this.data.conditions.length,
      drugs: this.data.drugs.length,
      symptoms: this.data.symptoms.length,
      emergencyConditions: this.data.emergencyConditions.length,
      interactionRecords: Object.values(this.data.interactions).reduce(
        (total, records) => total + records.length,
        0
      ),
    };
  }
}
