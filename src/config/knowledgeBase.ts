import fs from 'fs';
import { z } from 'zod';
import {
  Condition,
  Drug,
  InteractionRecord,
  InteractionTable,
  KnowledgeBaseData,
  Symptom,
} from '../types/knowledge.types';
import { createError } from '../middleware/error.middleware';

const text = z.string().default('');
const list = z.array(z.string()).default([]);

const conditionSchema: z.ZodType<Condition, z.ZodTypeDef, unknown> = z.object({
  id: z.string().min(1),
  name: text,
  icd10Code: text,
  symptoms: list,
  causes: list,
  treatments: list,
  complications: list,
  prevention: list,
  riskFactors: list,
  diagnosticTests: list,
  severity: z.enum(['Critical', 'High', 'Moderate', 'Low', 'Info']).default('Info'),
  prevalence: text,
  ageGroups: list,
  specialties: list,
});

const drugSchema: z.ZodType<Drug, z.ZodTypeDef, unknown> = z.object({
  id: z.string().min(1),
  name: text,
  genericName: text,
  drugClass: text,
  indications: list,
  contraindications: list,
  sideEffects: list,
  interactions: list,
  dosage: text,
  pregnancyCategory: text,
  monitoring: list,
});

const symptomSchema: z.ZodType<Symptom, z.ZodTypeDef, unknown> = z.object({
  id: z.string().min(1),
  name: text,
  possibleConditions: list,
  severityIndicators: list,
  whenToSeekHelp: list,
  selfCare: list,
});

// `effect` is the older name for the mechanism text
const interactionRowSchema = z
  .object({
    drug: z.string().min(1),
    severity: z.enum(['Contraindicated', 'Major', 'Moderate', 'Minor']),
    mechanism: z.string().optional(),
    effect: z.string().optional(),
    management: text,
  })
  .transform(({ drug, severity, mechanism, effect, management }) => ({
    drug,
    severity,
    mechanism: mechanism ?? effect ?? '',
    management,
  }));

const knowledgeBaseSchema = z.object({
  conditions: z.array(conditionSchema).default([]),
  drugs: z.array(drugSchema).default([]),
  symptoms: z.array(symptomSchema).default([]),
  emergencyConditions: list,
  interactions: z.record(z.string().min(1), z.array(interactionRowSchema)).default({}),
});

const toInteractionTable = (
  rows: z.infer<typeof knowledgeBaseSchema>['interactions']
): InteractionTable => {
  const table: Record<string, InteractionRecord[]> = {};
  for (const [primary, partners] of Object.entries(rows)) {
    table[primary] = partners.map((row) => ({
      drugs: [primary, row.drug] as const,
      severity: row.severity,
      mechanism: row.mechanism,
      management: row.management,
    }));
  }
  return table;
};

const formatIssues = (error: z.ZodError): string =>
  error.issues
    .slice(0, 5)
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');

/**
 * Validates raw seed data and fills in defaults for any absent
 * collection (empty list) or scalar (empty string).
 */
export const parseKnowledgeBase = (raw: unknown): KnowledgeBaseData => {
  const result = knowledgeBaseSchema.safeParse(raw);

  if (!result.success) {
    throw createError(`Invalid knowledge base: ${formatIssues(result.error)}`, 500);
  }

  return {
    conditions: result.data.conditions,
    drugs: result.data.drugs,
    symptoms: result.data.symptoms,
    emergencyConditions: result.data.emergencyConditions,
    interactions: toInteractionTable(result.data.interactions),
  };
};

export const readKnowledgeBaseFile = (filePath: string): KnowledgeBaseData => {
  let raw: unknown;

  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error: unknown) {
    const reason = error instanceof Error ? error.message : String(error);
    throw createError(`Failed to read knowledge base at ${filePath}: ${reason}`, 500);
  }

  return parseKnowledgeBase(raw);
};
