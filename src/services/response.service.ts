import { InteractionService } from './interaction.service';
import { createError } from '../middleware/error.middleware';
import { Condition, InteractionRecord, Symptom } from '../types/knowledge.types';
import { SearchResult } from '../types/search.types';
import {
  EmergencyAlert,
  MedicalResponse,
  NoResultsResponse,
  PatientContext,
  ResponseBundle,
} from '../types/response.types';

export const EMERGENCY_KEYWORDS = [
  'chest pain',
  'heart attack',
  'stroke',
  'difficulty breathing',
  'severe headache',
  'confusion',
  'unconscious',
  'bleeding',
  'severe pain',
  'emergency',
  'urgent',
];

export const EMERGENCY_MESSAGE =
  'MEDICAL EMERGENCY - If you are experiencing a medical emergency, call 911 immediately or go to the nearest emergency room.';

export const EMERGENCY_NUMBERS = ['911', 'Emergency Room', 'Poison Control: 1-800-222-1222'];

export const MEDICAL_DISCLAIMER =
  'IMPORTANT MEDICAL DISCLAIMER: This information is for educational purposes only and is not intended to replace ' +
  'professional medical advice, diagnosis, or treatment. Always seek the advice of your physician or other qualified ' +
  'health provider with any questions you may have regarding a medical condition. Never disregard professional medical ' +
  'advice or delay in seeking it because of something you have read here.';

export const NO_RESULTS_MESSAGE =
  "I couldn't find specific information about your query. Please try rephrasing your question or consult with a healthcare professional.";

export const REPHRASE_SUGGESTIONS = [
  'Try using different medical terms',
  'Be more specific about symptoms',
  'Check spelling of medical terms',
  'Consult with a healthcare provider',
];

export const GENERAL_RECOMMENDATIONS = [
  'Maintain a healthy lifestyle with regular exercise and balanced diet',
  'Follow up with your healthcare provider for proper diagnosis and treatment',
  'Keep track of your symptoms and their patterns',
  'Take medications as prescribed by your doctor',
];

export const GENERAL_SEEK_HELP_ADVICE = [
  'Seek immediate medical attention if symptoms are severe or worsening',
  'Contact your healthcare provider if symptoms persist or interfere with daily activities',
  'Go to emergency room for life-threatening symptoms',
];

const EVIDENCE_SOURCES = [
  'American Medical Association (AMA)',
  'Centers for Disease Control and Prevention (CDC)',
  'World Health Organization (WHO)',
  'National Institutes of Health (NIH)',
  'Mayo Clinic',
  'Cleveland Clinic',
  'Johns Hopkins Medicine',
  'American Heart Association (AHA)',
  'American Diabetes Association (ADA)',
  'Medical Literature and Clinical Guidelines',
];

const PRIMARY_COUNT = 5;
const ADDITIONAL_COUNT = 5;
const MAX_RELATED = 6;
const MAX_RECOMMENDATIONS = 8;
const MAX_SEEK_HELP = 6;

const conditionsOf = (results: SearchResult[]): Condition[] =>
  results.flatMap((result) => (result.type === 'condition' ? [result.data] : []));

const symptomsOf = (results: SearchResult[]): Symptom[] =>
  results.flatMap((result) => (result.type === 'symptom' ? [result.data] : []));

// results built outside the loader may lack list fields
const itemsOf = (items: readonly string[] | undefined, count: number): string[] =>
  (items ?? []).slice(0, count);

export class ResponseService {
  constructor(private readonly interactions: InteractionService) {}

  compose(query: string, results: SearchResult[], patientContext?: PatientContext): ResponseBundle {
    if (typeof query !== 'string' || !Array.isArray(results)) {
      throw createError('Invalid input: query must be a string and results an array', 400);
    }

    if (results.length === 0) {
      return this.noResults(query);
    }

    const response: MedicalResponse = {
      status: 'results',
      query,
      emergencyAlert: this.checkEmergency(query),
      primaryResults: results.slice(0, PRIMARY_COUNT),
      additionalResults: results.slice(PRIMARY_COUNT, PRIMARY_COUNT + ADDITIONAL_COUNT),
      relatedInformation: this.relatedInformation(results),
      recommendations: this.recommendations(results),
      whenToSeekHelp: this.seekHelpAdvice(results),
      interactionWarnings: this.interactionWarnings(patientContext),
      disclaimer: MEDICAL_DISCLAIMER,
      sources: EVIDENCE_SOURCES.slice(0, 5),
    };

    return response;
  }

  /** Inspects the raw query only, never the matched entities. */
  checkEmergency(query: string): EmergencyAlert | null {
    const normalized = query.toLowerCase();
    if (!EMERGENCY_KEYWORDS.some((keyword) => normalized.includes(keyword))) {
      return null;
    }
    return {
      alert: true,
      message: EMERGENCY_MESSAGE,
      emergencyNumbers: [...EMERGENCY_NUMBERS],
    };
  }

  private noResults(query: string): NoResultsResponse {
    return {
      status: 'no_results',
      query,
      message: NO_RESULTS_MESSAGE,
      suggestions: [...REPHRASE_SUGGESTIONS],
      disclaimer: MEDICAL_DISCLAIMER,
    };
  }

  private relatedInformation(results: SearchResult[]): string[] {
    const related = conditionsOf(results).slice(0, 3).flatMap((condition) => [
      ...itemsOf(condition.prevention, 2).map((item) => `Prevention: ${item}`),
      ...itemsOf(condition.riskFactors, 2).map((item) => `Risk factor: ${item}`),
    ]);
    return related.slice(0, MAX_RELATED);
  }

  private recommendations(results: SearchResult[]): string[] {
    const specific = conditionsOf(results).slice(0, 2).flatMap((condition) => itemsOf(condition.prevention, 2));
    return [...GENERAL_RECOMMENDATIONS, ...specific].slice(0, MAX_RECOMMENDATIONS);
  }

  private seekHelpAdvice(results: SearchResult[]): string[] {
    const specific = symptomsOf(results).slice(0, 2).flatMap((symptom) => itemsOf(symptom.whenToSeekHelp, 2));
    return Array.from(new Set([...GENERAL_SEEK_HELP_ADVICE, ...specific])).slice(0, MAX_SEEK_HELP);
  }

  private interactionWarnings(patientContext?: PatientContext): InteractionRecord[] {
    const medications = patientContext?.medications ?? [];
    return medications.length > 0 ? this.interactions.checkInteractions(medications) : [];
  }
}
