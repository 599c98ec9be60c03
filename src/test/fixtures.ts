import { parseKnowledgeBase } from '../config/knowledgeBase';
import { KnowledgeStore } from '../services/knowledge.service';

export const fixtureData = {
  conditions: [
    {
      id: 'diabetes_type2',
      name: 'Type 2 Diabetes Mellitus',
      icd10Code: 'E11',
      symptoms: ['Frequent urination', 'Excessive thirst'],
      causes: ['Insulin resistance', 'Obesity'],
      treatments: ['Metformin', 'Insulin'],
      prevention: ['Healthy diet', 'Regular exercise', 'Weight management'],
      riskFactors: ['Obesity', 'Family history', 'Age >45'],
      severity: 'High',
    },
    {
      id: 'hypertension',
      name: 'Hypertension',
      icd10Code: 'I10',
      symptoms: ['Headaches', 'Chest pain'],
      causes: ['Stress'],
      treatments: ['ACE inhibitors'],
      prevention: ['Limit salt', 'Quit smoking'],
      riskFactors: ['Age >40', 'Family history'],
      severity: 'High',
    },
  ],
  drugs: [
    {
      id: 'metformin',
      name: 'Metformin',
      genericName: 'Metformin hydrochloride',
      drugClass: 'Biguanide antidiabetic',
      indications: ['Type 2 diabetes', 'Prediabetes'],
    },
    {
      id: 'warfarin',
      name: 'Warfarin',
      genericName: 'Warfarin sodium',
      drugClass: 'Anticoagulant',
      indications: ['Atrial fibrillation'],
    },
  ],
  symptoms: [
    {
      id: 'chest_pain',
      name: 'Chest Pain',
      possibleConditions: ['Heart attack', 'Angina'],
      whenToSeekHelp: ['Severe crushing pain', 'Pain with shortness of breath', 'Pain radiating to arm'],
    },
    {
      id: 'headache',
      name: 'Headache',
      possibleConditions: ['Migraine', 'Tension headache'],
      whenToSeekHelp: ['Sudden severe headache', 'Headache with fever'],
    },
  ],
  emergencyConditions: ['Heart attack', 'Stroke'],
  interactions: {
    warfarin: [
      { drug: 'NSAIDs', severity: 'Major', mechanism: 'Increased bleeding risk', management: 'Prefer acetaminophen' },
      { drug: 'Antifungals', severity: 'Moderate', mechanism: 'Increased anticoagulation', management: 'Monitor INR' },
    ],
    metformin: [
      { drug: 'Contrast dye', severity: 'Contraindicated', mechanism: 'Lactic acidosis risk', management: 'Hold before imaging' },
      { drug: 'Alcohol', severity: 'Moderate', mechanism: 'Increased lactic acidosis risk', management: 'Limit alcohol' },
    ],
  },
};

export const buildStore = (raw: unknown = fixtureData): KnowledgeStore =>
  new KnowledgeStore(parseKnowledgeBase(raw));

/** `count` conditions named "Condition <i>", each matching the query "condition" with score 10 */
export const buildNumberedStore = (count: number): KnowledgeStore =>
  buildStore({
    conditions: Array.from({ length: count }, (_, i) => ({
      id: `c${i}`,
      name: `Condition ${i}`,
      prevention: [`Prevent ${i}a`, `Prevent ${i}b`, `Prevent ${i}c`],
      riskFactors: [`Risk ${i}a`, `Risk ${i}b`, `Risk ${i}c`],
    })),
  });
