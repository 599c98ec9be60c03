import { InteractionRecord } from './knowledge.types';
import { SearchResult } from './search.types';

export interface PatientContext {
  age?: number | null;
  gender?: string | null;
  conditions?: readonly string[];
  medications?: readonly string[];
  allergies?: readonly string[];
}

export interface EmergencyAlert {
  alert: true;
  message: string;
  emergencyNumbers: string[];
}

export interface MedicalResponse {
  status: 'results';
  query: string;
  emergencyAlert: EmergencyAlert | null;
  primaryResults: SearchResult[];
  additionalResults: SearchResult[];
  relatedInformation: string[];
  recommendations: string[];
  whenToSeekHelp: string[];
  interactionWarnings: InteractionRecord[];
  disclaimer: string;
  sources: string[];
}

export interface NoResultsResponse {
  status: 'no_results';
  query: string;
  message: string;
  suggestions: string[];
  disclaimer: string;
}

export type ResponseBundle = MedicalResponse | NoResultsResponse;
