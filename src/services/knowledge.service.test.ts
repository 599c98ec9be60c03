import { describe, it, expect } from 'vitest';
import { KnowledgeStore } from './knowledge.service';
import { SearchService } from './search.service';
import { parseKnowledgeBase } from '../config/knowledgeBase';
import { config } from '../config/env';
import { buildStore } from '../test/fixtures';

describe('parseKnowledgeBase', () => {
  it('fills in defaults for absent fields', () => {
    const data = parseKnowledgeBase({ conditions: [{ id: 'x', name: 'Mystery fever' }] });

    expect(data.conditions[0]).toEqual({
      id: 'x',
      name: 'Mystery fever',
      icd10Code: '',
      symptoms: [],
      causes: [],
      treatments: [],
      complications: [],
      prevention: [],
      riskFactors: [],
      diagnosticTests: [],
      severity: 'Info',
      prevalence: '',
      ageGroups: [],
      specialties: [],
    });
    expect(data.drugs).toEqual([]);
    expect(data.symptoms).toEqual([]);
    expect(data.emergencyConditions).toEqual([]);
    expect(data.interactions).toEqual({});
  });

  it('turns interaction rows into records keyed by primary drug', () => {
    const data = parseKnowledgeBase({
      interactions: { warfarin: [{ drug: 'NSAIDs', severity: 'Major', effect: 'Increased bleeding risk' }] },
    });

    expect(data.interactions).toEqual({
      warfarin: [
        { drugs: ['warfarin', 'NSAIDs'], severity: 'Major', mechanism: 'Increased bleeding risk', management: '' },
      ],
    });
  });

  it('rejects unknown severities', () => {
    expect(() =>
      parseKnowledgeBase({ interactions: { warfarin: [{ drug: 'NSAIDs', severity: 'Severe' }] } })
    ).toThrow(/^Invalid knowledge base: interactions\.warfarin\.0\.severity/);
  });

  it('rejects an interaction table keyed by an empty drug name', () => {
    expect(() =>
      parseKnowledgeBase({ interactions: { '': [{ drug: 'Grapefruit', severity: 'Minor' }] } })
    ).toThrow(/^Invalid knowledge base: interactions/);
  });

  it('rejects entities without an identifier', () => {
    expect(() => parseKnowledgeBase({ drugs: [{ name: 'Nameless' }] })).toThrow(/^Invalid knowledge base: drugs\.0\.id/);
  });
});

describe('KnowledgeStore', () => {
  const store = buildStore();

  it('exposes collections and lookups by id', () => {
    expect(store.getConditions().map((c) => c.id)).toEqual(['diabetes_type2', 'hypertension']);
    expect(store.getDrug('warfarin')?.genericName).toBe('Warfarin sodium');
    expect(store.getSymptom('headache')?.name).toBe('Headache');
    expect(store.getCondition('unknown')).toBeUndefined();
    expect(store.getEmergencyConditionNames()).toEqual(['Heart attack', 'Stroke']);
    expect(Object.keys(store.getInteractionTable())).toEqual(['warfarin', 'metformin']);
  });

  it('reports collection sizes', () => {
    expect(store.getStats()).toEqual({
      conditions: 2,
      drugs: 2,
      symptoms: 2,
      emergencyConditions: 2,
      interactionRecords: 4,
    });
  });

  it('freezes the loaded data', () => {
    const [condition] = store.getConditions();
    expect(Object.isFrozen(store.getConditions())).toBe(true);
    expect(Object.isFrozen(condition)).toBe(true);
    expect(Object.isFrozen(condition.symptoms)).toBe(true);
  });

  it('rejects duplicate identifiers within a collection', () => {
    expect(() => buildStore({ drugs: [{ id: 'dup' }, { id: 'dup' }] })).toThrow('Duplicate drug identifier: dup');
  });

  it('loads the bundled seed file', () => {
    const seed = KnowledgeStore.fromFile(config.knowledgeBase.path);

    expect(seed.getStats()).toEqual({
      conditions: 15,
      drugs: 3,
      symptoms: 3,
      emergencyConditions: 12,
      interactionRecords: 5,
    });

    const results = new SearchService(seed).search('diabetes');
    expect(results.map(({ id, score, relevance }) => ({ id, score, relevance }))).toEqual([
      { id: 'diabetes_type2', score: 10, relevance: 'high' },
      { id: 'metformin', score: 6, relevance: 'medium' },
    ]);
  });

  it('fails with the file path when the seed file is missing', () => {
    expect(() => KnowledgeStore.fromFile('/nonexistent/knowledge-base.json')).toThrow(
      /^Failed to read knowledge base at \/nonexistent\/knowledge-base\.json/
    );
  });
});
