export type SeverityLevel = 'Critical' | 'High' | 'Moderate' | 'Low' | 'Info';

export type InteractionSeverity = 'Contraindicated' | 'Major' | 'Moderate' | 'Minor';

export type EntityType = 'condition' | 'drug' | 'symptom';

export interface Condition {
  id: string;
  name: string;
  icd10Code: string;
  symptoms: readonly string[];
  causes: readonly string[];
  treatments: readonly string[];
  complications: readonly string[];
  prevention: readonly string[];
  riskFactors: readonly string[];
  diagnosticTests: readonly string[];
  severity: SeverityLevel;
  prevalence: string;
  ageGroups: readonly string[];
  specialties: readonly string[];
}

export interface Drug {
  id: string;
  name: string;
  genericName: string;
  drugClass: string;
  indications: readonly string[];
  contraindications: readonly string[];
  sideEffects: readonly string[];
  /** Informal partner names, not necessarily present in the interaction table */
  interactions: readonly string[];
  dosage: string;
  pregnancyCategory: string;
  monitoring: readonly string[];
}

export interface Symptom {
  id: string;
  name: string;
  possibleConditions: readonly string[];
  severityIndicators: readonly string[];
  whenToSeekHelp: readonly string[];
  selfCare: readonly string[];
}

export interface InteractionRecord {
  /** [primary, partner]; membership is order-independent */
  drugs: readonly [string, string];
  severity: InteractionSeverity;
  mechanism: string;
  management: string;
}

/** Keyed by primary drug name */
export type InteractionTable = Readonly<Record<string, readonly InteractionRecord[]>>;

export interface KnowledgeBaseData {
  conditions: readonly Condition[];
  drugs: readonly Drug[];
  symptoms: readonly Symptom[];
  emergencyConditions: readonly string[];
  interactions: InteractionTable;
}

export interface KnowledgeBaseStats {
  conditions: number;
  drugs: number;
  symptoms: number;
  emergencyConditions: number;
  interactionRecords: number;
}
